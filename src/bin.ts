#!/usr/bin/env -S node --import tsx
import { readFile } from 'node:fs/promises'
import { text } from 'node:stream/consumers'
import { runCli } from './cli.ts'

process.exitCode = await runCli(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  stdinIsTTY: process.stdin.isTTY === true,
  readStdin: () => text(process.stdin),
  readFile: (path) => readFile(path, 'utf8'),
})
