/**
 * Zod validation schemas for the Shipline configuration system.
 *
 * Sections:
 *  - session limits
 *  - stale-branch threshold
 *  - agent process
 *  - credential probe
 *  - sensitivity patterns
 *  - comment markers
 *  - notifications
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const ModeSchema = z.enum(['attended', 'unattended'])

/** A regular-expression source string; rejected at load time if it does not compile */
const RegexSourceSchema = z.string().refine(
  (source) => {
    try {
      new RegExp(source)
      return true
    } catch {
      return false
    }
  },
  { message: 'Invalid regular expression' }
)

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

export const SessionSettingsSchema = z
  .object({
    /** Issues completed before the session reports token_limit */
    max_issues: z.number().int().min(1),
    /** Whole elapsed hours before the session reports time_limit */
    max_hours: z.number().int().min(1),
  })
  .strict()

export type SessionSettings = z.infer<typeof SessionSettingsSchema>

export const StaleSettingsSchema = z
  .object({
    /** Commits behind mainline at which a branch is closed and restarted */
    threshold: z.number().int().min(1),
  })
  .strict()

export const AgentSettingsSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()),
    timeout_seconds: z.number().int().min(1),
    heartbeat_seconds: z.number().int().min(1),
    /** Grace period between SIGTERM and SIGKILL on timeout */
    kill_grace_seconds: z.number().int().min(0),
  })
  .strict()

export type AgentSettings = z.infer<typeof AgentSettingsSchema>

export const CredentialSettingsSchema = z
  .object({
    skip_check: z.boolean(),
    /** Probe command; exit code 0 means credentials are valid */
    command: z.string().min(1),
    args: z.array(z.string()),
  })
  .strict()

export type CredentialSettings = z.infer<typeof CredentialSettingsSchema>

export const BlockerPatternsSchema = z
  .object({
    infrastructure: z.array(RegexSourceSchema),
    migrations: z.array(RegexSourceSchema),
    auth: z.array(RegexSourceSchema),
    /** Paths matching these are never reported as auth-sensitive */
    auth_exclude: z.array(RegexSourceSchema),
    architecture_docs: z.array(RegexSourceSchema),
    /** Substring matches against changed paths */
    protected_scripts: z.array(z.string()),
    /** Word matches against the diff body, case-insensitive */
    expensive_services: z.array(z.string()),
  })
  .strict()

export type BlockerPatterns = z.infer<typeof BlockerPatternsSchema>

export const MarkerSettingsSchema = z
  .object({
    review: z.string().min(1),
    assessment: z.string().min(1),
  })
  .strict()

export type MarkerSettings = z.infer<typeof MarkerSettingsSchema>

export const NotesSettingsSchema = z
  .object({
    security_keep: z.number().int().min(1),
    completed_keep: z.number().int().min(1),
  })
  .strict()

export type NotesSettings = z.infer<typeof NotesSettingsSchema>

export const NotificationSettingsSchema = z
  .object({
    /** Command that receives each notification on stdin; null logs only */
    command: z.string().min(1).nullable(),
    args: z.array(z.string()),
  })
  .strict()

export type NotificationSettings = z.infer<typeof NotificationSettingsSchema>

export const PipelineSettingsSchema = z
  .object({
    max_fix_cycles: z.number().int().min(1),
    /** Steps through the phase loop before an issue is reported failed */
    max_steps: z.number().int().min(1),
  })
  .strict()

// ---------------------------------------------------------------------------
// Full config document
// ---------------------------------------------------------------------------

export const ShiplineConfigSchema = z
  .object({
    log_level: LogLevelSchema,
    mode: ModeSchema,
    mainline: z.string().min(1),
    remote: z.string().min(1),
    /** Shared data directory, relative to the main repository root */
    data_dir: z.string().min(1),
    /** Worktree parent directory; relative paths resolve against the repository root */
    worktree_dir: z.string().min(1),
    session: SessionSettingsSchema,
    stale: StaleSettingsSchema,
    agent: AgentSettingsSchema,
    credentials: CredentialSettingsSchema,
    blockers: BlockerPatternsSchema,
    markers: MarkerSettingsSchema,
    notes: NotesSettingsSchema,
    notifications: NotificationSettingsSchema,
    pipeline: PipelineSettingsSchema,
  })
  .strict()

export type ShiplineConfig = z.infer<typeof ShiplineConfigSchema>

/** Partial config used for file and env overlays */
export const PartialShiplineConfigSchema = z
  .object({
    log_level: LogLevelSchema.optional(),
    mode: ModeSchema.optional(),
    mainline: z.string().min(1).optional(),
    remote: z.string().min(1).optional(),
    data_dir: z.string().min(1).optional(),
    worktree_dir: z.string().min(1).optional(),
    session: SessionSettingsSchema.partial().optional(),
    stale: StaleSettingsSchema.partial().optional(),
    agent: AgentSettingsSchema.partial().optional(),
    credentials: CredentialSettingsSchema.partial().optional(),
    blockers: BlockerPatternsSchema.partial().optional(),
    markers: MarkerSettingsSchema.partial().optional(),
    notes: NotesSettingsSchema.partial().optional(),
    notifications: NotificationSettingsSchema.partial().optional(),
    pipeline: PipelineSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialShiplineConfig = z.infer<typeof PartialShiplineConfigSchema>
