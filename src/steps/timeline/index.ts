export type {
  StatKind,
  StatCategory,
  DateAxis,
  ObservedStatEvent,
  StatColumn,
  TimelineTable,
  FetchPlayerEvents,
} from './types';
export * from './errors';
export { buildDateAxis, axisIndex } from './axis';
export { fillColumn } from './fill';
export type { FillResult } from './fill';
export { stageColumns, commitMerge, rollbackMerge, hasColumn, getColumn, missingPlayers } from './merge';
export type { PendingMerge } from './merge';
export {
  loadStatCatalog,
  parseStatCatalog,
  statKind,
  statLabel,
  classifyStat,
  primaryCategory,
  readCategorizedStat,
} from './stat_kinds';
export type { StatCatalog, StatClassification, StatReport, CategorizedValue } from './stat_kinds';
