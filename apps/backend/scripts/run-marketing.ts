#!/usr/bin/env tsx
import 'dotenv/config'
import process from 'node:process'
import { main } from '../src/cli.js'

main(process.argv.slice(2), process.env).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    console.error(err)
    process.exitCode = 1
  }
)
