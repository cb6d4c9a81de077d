export {
  type CellValue,
  columnDefault,
  columnName,
  type HistoryRow,
  type HistorySeries,
  parseCell,
  projectSnapshot,
  splitColumn,
  TIMESTAMP_COLUMN
} from './columns';
export { computeGrowth, findBaseline, GROWTH_FIELDS } from './growth';
export { HistoryStore, type HistoryStoreOptions, type LatestDocument } from './history-store';
