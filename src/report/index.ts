/**
 * Report rendering and export
 */

export { formatPercent, formatUsd, renderConsoleReport } from "./console";
export { CSV_HEADER, csvRow, escapeCsvField, toCsv, writeCsvReport } from "./csv";
export {
  JSON_REPORT_VERSION,
  ReportFormatError,
  parseJsonReport,
  serializeReport,
  toJsonReport,
  writeJsonReport,
} from "./json";
export { EXPLORER_TX_BASE_URL, MARKET_PAGE_BASE_URL, marketUrl, transactionUrl } from "./links";
