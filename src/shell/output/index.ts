export { reportDiagnostic } from "./diagnostics.js";
export { deliverReport, printReport, writeReportFile } from "./reporter.js";
