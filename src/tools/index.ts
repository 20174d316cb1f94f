// Profile analysis tools
export {
  analyzeProfile,
  analyzeProfileSchema,
  scoreRecords,
  scoreRecordsSchema,
  type AnalyzeProfileInput,
  type ScoreRecordsInput,
  type ToolContext,
} from './analyze.js';
