/**
 * Built-in default values for the Shipline configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type { BlockerPatterns, ShiplineConfig } from './config-schema.js'

export const DEFAULT_BLOCKER_PATTERNS: BlockerPatterns = {
  infrastructure: [
    'infrastructure/',
    'cdk/',
    'terraform/',
    'cloudformation/',
    '\\.github/workflows/',
    '\\.claude/',
  ],
  migrations: ['prisma/migrations/', 'migrations/', 'db/migrate/', 'alembic/'],
  auth: ['auth/', 'Auth', 'authentication', 'authorization', 'cognito', 'oauth'],
  auth_exclude: ['(^|/)tests?/', '(^|/)docs?/'],
  architecture_docs: ['Technical-Specs', 'Architecture', 'CLAUDE\\.md', 'ARCHITECTURE\\.md'],
  protected_scripts: [
    'scripts/shipline/',
    'bin/shipline',
    'scripts/ci/',
  ],
  expensive_services: ['rds', 'aurora', 'nat', 'ec2', 'fargate', 'sagemaker', 'redshift'],
}

export const DEFAULT_CONFIG: ShiplineConfig = {
  log_level: 'warn',
  mode: 'attended',
  mainline: 'main',
  remote: 'origin',
  data_dir: '.shipline',
  worktree_dir: '../shipline-worktrees',
  session: {
    max_issues: 8,
    max_hours: 4,
  },
  stale: {
    threshold: 10,
  },
  agent: {
    command: 'claude',
    args: ['--print'],
    timeout_seconds: 1800,
    heartbeat_seconds: 60,
    kill_grace_seconds: 10,
  },
  credentials: {
    skip_check: true,
    command: 'aws',
    args: ['sts', 'get-caller-identity'],
  },
  blockers: DEFAULT_BLOCKER_PATTERNS,
  markers: {
    review: 'shipline-review',
    assessment: 'shipline-assessment',
  },
  notes: {
    security_keep: 5,
    completed_keep: 20,
  },
  notifications: {
    command: null,
    args: [],
  },
  pipeline: {
    max_fix_cycles: 3,
    max_steps: 12,
  },
}
