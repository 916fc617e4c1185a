/**
 * Zod schemas for the session record and per-issue snapshots as stored on
 * disk. Records that fail validation are treated as absent.
 */

import { z } from 'zod'

export const LimitReasonSchema = z.enum(['token_limit', 'time_limit'])
export type LimitReason = z.infer<typeof LimitReasonSchema>

export const SessionStateSchema = z
  .object({
    /** Epoch seconds */
    startTime: z.number().int(),
    mode: z.enum(['attended', 'unattended']),
    issuesCompleted: z.number().int().min(0),
    issuesFailed: z.number().int().min(0),
    currentIssue: z.number().int().nullable(),
    worktreePath: z.string().nullable(),
    lastUpdate: z.number().int(),
    /** First limit reached this session; latched until the next init */
    limitReached: LimitReasonSchema.nullable(),
    /** `${issue}:${blockerType}` keys approved by a human */
    approvedBlockers: z.array(z.string()),
    /** `${issue}:${notificationType}` keys already sent */
    notificationsSent: z.array(z.string()),
  })
  .strict()

export type SessionState = z.infer<typeof SessionStateSchema>

export const SnapshotSchema = z
  .object({
    savedAt: z.number().int(),
    reason: z.string(),
    issue: z.number().int(),
    worktreePath: z.string().nullable(),
    session: SessionStateSchema,
    /** `git status --short` lines at save time */
    gitStatus: z.array(z.string()),
    /** `git log -1 --oneline` at save time */
    lastCommit: z.string().nullable(),
  })
  .strict()

export type Snapshot = z.infer<typeof SnapshotSchema>
