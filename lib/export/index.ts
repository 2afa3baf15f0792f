export * from './report-tables';
export { buildWorkbook, renderCsv, writeCsvReports, writeWorkbookReport } from './report-writer';
