export { traceLog, isTraceEnabled, type TraceCategory } from "./trace-log.js";
