/**
 * Notes document model: a markdown file with a free-form preamble and
 * `## ` sections, where some sections hold `### ` entries.
 *
 * Parsing is line based and lossless for the parts it recognises: text
 * outside the three known sections passes through unchanged.
 */

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

export type NotesSectionKey = 'current' | 'security' | 'archive'

interface SectionSpec {
  heading: string
  placeholder: string
}

export const NOTES_SECTIONS: Record<NotesSectionKey, SectionSpec> = {
  current: { heading: '## Current Work', placeholder: '_No active work_' },
  security: {
    heading: '## Recent Security Findings',
    placeholder: '_Security issues found in recent PR reviews._',
  },
  archive: { heading: '## Completed Work Archive', placeholder: '_Recently merged work._' },
}

const SECTION_ORDER: NotesSectionKey[] = ['current', 'security', 'archive']

export const NOTES_TITLE = '# Shipline Notes'

// ---------------------------------------------------------------------------
// Model
// ---------------------------------------------------------------------------

export interface NotesSection {
  /** Full heading line, e.g. "## Recent Security Findings (Last 5 PRs)" */
  heading: string
  /** Lines before the first entry */
  intro: string[]
  /** Each entry starts with its `### ` line */
  entries: string[][]
}

export interface NotesDocument {
  preamble: string[]
  sections: NotesSection[]
}

function trimBlank(lines: string[]): string[] {
  let start = 0
  let end = lines.length
  while (start < end && lines[start]?.trim() === '') start += 1
  while (end > start && lines[end - 1]?.trim() === '') end -= 1
  return lines.slice(start, end)
}

function parseSection(heading: string, body: string[]): NotesSection {
  const intro: string[] = []
  const entries: string[][] = []
  for (const line of body) {
    if (line.startsWith('### ')) {
      entries.push([line])
    } else {
      const current = entries[entries.length - 1]
      if (current === undefined) intro.push(line)
      else current.push(line)
    }
  }
  return { heading, intro: trimBlank(intro), entries: entries.map(trimBlank) }
}

export function parseNotes(text: string): NotesDocument {
  const preamble: string[] = []
  const raw: { heading: string; body: string[] }[] = []
  for (const line of text.split('\n')) {
    if (line.startsWith('## ')) {
      raw.push({ heading: line.trimEnd(), body: [] })
      continue
    }
    const current = raw[raw.length - 1]
    if (current === undefined) preamble.push(line)
    else current.body.push(line)
  }
  return {
    preamble: trimBlank(preamble),
    sections: raw.map((s) => parseSection(s.heading, s.body)),
  }
}

export function renderNotes(doc: NotesDocument): string {
  const blocks: string[] = []
  if (doc.preamble.length > 0) blocks.push(doc.preamble.join('\n'))
  for (const section of doc.sections) {
    const parts = [section.heading]
    if (section.intro.length > 0) parts.push(section.intro.join('\n'))
    for (const entry of section.entries) parts.push(entry.join('\n'))
    blocks.push(parts.join('\n\n'))
  }
  return `${blocks.join('\n\n')}\n`
}

export function emptyNotes(): NotesDocument {
  return {
    preamble: [NOTES_TITLE, '', 'Working notes, security findings and completed work shared across worktrees.'],
    sections: SECTION_ORDER.map((key) => ({
      heading: NOTES_SECTIONS[key].heading,
      intro: [NOTES_SECTIONS[key].placeholder],
      entries: [],
    })),
  }
}

// ---------------------------------------------------------------------------
// Edits
// ---------------------------------------------------------------------------

/** Find a known section by heading prefix, appending it when missing */
export function ensureSection(doc: NotesDocument, key: NotesSectionKey): NotesSection {
  const spec = NOTES_SECTIONS[key]
  const found = doc.sections.find((s) => s.heading.startsWith(spec.heading))
  if (found !== undefined) return found
  const created: NotesSection = { heading: spec.heading, intro: [spec.placeholder], entries: [] }
  doc.sections.push(created)
  return created
}

/** Replace the whole body of a section; an empty `lines` restores its placeholder */
export function replaceSection(doc: NotesDocument, key: NotesSectionKey, lines: string[]): void {
  const section = ensureSection(doc, key)
  const body = parseSection(section.heading, lines.length === 0 ? [NOTES_SECTIONS[key].placeholder] : lines)
  section.intro = body.intro
  section.entries = body.entries
}

/** Add an entry at the top of a section and keep the newest `keep` */
export function prependEntry(doc: NotesDocument, key: NotesSectionKey, entry: string[], keep: number): void {
  const section = ensureSection(doc, key)
  section.entries = [trimBlank(entry), ...section.entries].slice(0, keep)
}
