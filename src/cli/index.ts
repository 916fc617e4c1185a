#!/usr/bin/env node
/**
 * Shipline CLI - Main entry point
 * Provides the `shipline` command-line interface
 */

import { readFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Command } from 'commander'
import { z } from 'zod'
import { createLogger } from '../utils/logger.js'
import { registerPhaseCommand } from './commands/phase.js'
import { registerRunCommand } from './commands/run.js'
import { registerSessionCommand } from './commands/session.js'

const logger = createLogger('cli')

const PackageJsonSchema = z.object({ name: z.string().optional(), version: z.string().optional() })

/** Read the version from package.json, run from either src/ or dist/ */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../package.json')]) {
    let raw: string
    try {
      raw = await readFile(pkgPath, 'utf-8')
    } catch {
      continue
    }
    const pkg = PackageJsonSchema.safeParse(JSON.parse(raw))
    if (pkg.success && pkg.data.name === 'shipline') return pkg.data.version ?? '0.0.0'
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('shipline')
    .description('Shipline - take issues from development to merge')
    .version(version, '-v, --version', 'Output the current version')

  registerRunCommand(program)
  registerPhaseCommand(program)
  registerSessionCommand(program)

  return program
}

async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

void main()
