export { formatOutcomeLine, summarize } from "./summary.js";
export { summaryLogFileName, writeSummaryLog } from "./logger.js";
