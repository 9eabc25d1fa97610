#!/usr/bin/env node

import { createProgram } from './cli'
import log from './logger'

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    log.error(error)
    process.exit(1)
  })
