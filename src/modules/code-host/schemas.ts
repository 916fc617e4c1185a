/**
 * Zod schemas for `gh` JSON output.
 */

import { z } from 'zod'

export const GhIssueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  body: z.string().nullable().default(''),
})

export const GhPullRequestSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  body: z.string().nullable().default(''),
  headRefName: z.string(),
  headRefOid: z.string(),
  isDraft: z.boolean().default(false),
  state: z.enum(['OPEN', 'MERGED', 'CLOSED']),
  url: z.string().optional(),
})

export type GhPullRequest = z.infer<typeof GhPullRequestSchema>

export const GhPullRequestListSchema = z.array(GhPullRequestSchema)

export const GhCommentsSchema = z.object({
  comments: z.array(
    z.object({
      id: z.string(),
      body: z.string(),
      createdAt: z.string(),
      author: z.object({ login: z.string() }).nullable().optional(),
    })
  ),
})

export const GhCommitsSchema = z.object({
  commits: z.array(
    z.object({
      oid: z.string(),
      messageHeadline: z.string(),
      authoredDate: z.string(),
      committedDate: z.string(),
    })
  ),
})

export const GhFilesSchema = z.object({
  files: z.array(z.object({ path: z.string() })),
})

export const GhHeadSchema = z.object({
  headRefOid: z.string(),
})

export const PR_JSON_FIELDS = 'number,title,body,headRefName,headRefOid,isDraft,state,url'
