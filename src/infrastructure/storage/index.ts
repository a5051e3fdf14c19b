export { MemoryDraftStore, parsePersistedDraft, parseDraftJSON } from './draftStore'
export { FileDraftStore } from './fileDraftStore'
