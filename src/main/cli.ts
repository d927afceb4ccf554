#!/usr/bin/env node
import { main } from './app'

main().then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    console.error('[main] Unhandled error:', err)
    process.exitCode = 1
  }
)
