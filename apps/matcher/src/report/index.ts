export { buildReportRows, buildStoreCell, createReport, priceDifference, writeReport } from './report'
export type { ComparisonReport, ReportRow, StoreCell } from './report'
