export { analyzeComplaint, type AnalyzerDeps, type AnalysisOutcome } from './analyze.js';
export { httpStatusFor } from './status.js';
