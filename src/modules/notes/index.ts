/**
 * Barrel exports for the notes module.
 */

export { NotesStore, createNotesStore } from './notes-store.js'
export type { NotesStoreDeps, CurrentWork, CompletedWork } from './notes-store.js'
export {
  parseNotes,
  renderNotes,
  emptyNotes,
  ensureSection,
  replaceSection,
  prependEntry,
  NOTES_SECTIONS,
} from './notes-document.js'
export type { NotesDocument, NotesSection, NotesSectionKey } from './notes-document.js'
export { extractSecurityFindings } from './security-findings.js'
