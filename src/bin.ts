#!/usr/bin/env node
// Memsift executable entry point

import { run } from './cli.js'

run().catch((error) => {
  console.error('✗ memsift failed:', error instanceof Error ? error.message : error)
  process.exit(1)
})
