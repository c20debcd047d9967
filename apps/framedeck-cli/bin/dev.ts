#!/usr/bin/env tsx

import { execute } from '@oclif/core';

// Development entry: commands are loaded from src/ through tsx, no build needed
await execute({ development: true, dir: import.meta.url });
