import { z } from 'zod';

// Tool argument schemas. Shapes only; the checks in validation.ts cover
// emptiness and limits.

export const StoreDocumentContentArgs = z.object({
  content: z.string(),
  source_type: z.string().optional(),
  startup_name: z.string().optional()
});
export type StoreDocumentContentArgs = z.infer<typeof StoreDocumentContentArgs>;

export const ProcessUploadedFileArgs = z.object({
  file_path: z.string(),
  startup_name: z.string().optional()
});
export type ProcessUploadedFileArgs = z.infer<typeof ProcessUploadedFileArgs>;

export const ProcessUploadedFilesArgs = z.object({
  file_paths: z.array(z.string()),
  startup_name: z.string().optional()
});
export type ProcessUploadedFilesArgs = z.infer<typeof ProcessUploadedFilesArgs>;

export const RetrieveAllDocumentsArgs = z.object({
  include_content: z.boolean().optional()
});
export type RetrieveAllDocumentsArgs = z.infer<typeof RetrieveAllDocumentsArgs>;

export const SearchConversationHistoryArgs = z.object({
  query: z.string()
});
export type SearchConversationHistoryArgs = z.infer<typeof SearchConversationHistoryArgs>;

export const RecordConversationArgs = z.object({
  user_message: z.string(),
  agent_response: z.string().optional()
});
export type RecordConversationArgs = z.infer<typeof RecordConversationArgs>;

export const RunSpecialistAnalysisArgs = z.object({
  agent: z.string(),
  startup_name: z.string(),
  focus: z.string().optional(),
  stage: z.string().optional()
});
export type RunSpecialistAnalysisArgs = z.infer<typeof RunSpecialistAnalysisArgs>;

export const StartupReportArgs = z.object({
  startup_name: z.string(),
  stage: z.string().optional()
});
export type StartupReportArgs = z.infer<typeof StartupReportArgs>;

export const OrchestrateFullAnalysisArgs = z.object({
  startup_name: z.string()
});
export type OrchestrateFullAnalysisArgs = z.infer<typeof OrchestrateFullAnalysisArgs>;

export const EmptyArgs = z.object({}).strict();
