/**
 * Comment posted on a PR closed for being too far behind mainline.
 */

function block(lines: string[]): string {
  return ['```', lines.length === 0 ? '(none)' : lines.join('\n'), '```'].join('\n')
}

export function formatStaleCloseComment(
  behind: number,
  mainline: string,
  commits: string[],
  files: string[]
): string {
  return [
    `:arrows_counterclockwise: Closing: Branch is ${String(behind)} commits behind ${mainline}.`,
    '',
    '**Work summary:**',
    block(commits),
    '',
    '**Files modified:**',
    block(files),
    '',
    `This branch has diverged too far from ${mainline} for safe integration.`,
    `A fresh implementation will be started from current ${mainline}.`,
  ].join('\n')
}
