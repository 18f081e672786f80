export {
  type LedgerEntry,
  type ToolTraceStep,
  DEFAULT_PREVIEW_LENGTH,
  createLedgerEntry,
  firstEntryForTool,
  hasToolResult,
  previewObservation,
  parseObservation,
} from './ledger';
