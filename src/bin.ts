#!/usr/bin/env node
import { runCli } from './cli.js'
import { loadEnvFile } from './config.js'

loadEnvFile()

process.exitCode = await runCli(process.argv)
