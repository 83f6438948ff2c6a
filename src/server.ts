import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult
} from '@modelcontextprotocol/sdk/types.js';
import type { AnalysisServerConfig } from './config.js';
import { errorMessage } from './errors.js';
import { ExtractorRegistry } from './extractors.js';
import { type Logger, createSilentLogger } from './logger.js';
import { AnalysisPipeline } from './pipeline.js';
import { SessionStore } from './session-store.js';
import { AGENT_NAMES, type Analyst } from './types.js';
import * as ToolArgs from './tool-types.js';
import * as Validation from './validation.js';

export interface InvestorAnalysisServerOptions {
  config?: AnalysisServerConfig;
  logger?: Logger;
  extractors?: ExtractorRegistry;
  analysts?: Analyst[];
  now?: () => Date;
}

const SERVER_NAME = 'investor-analysis-mcp';
const SERVER_VERSION = '1.0.0';

function jsonResult(payload: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }]
  };
}

// Domain failures are tool results, not protocol errors: the session carries on.
function errorResult(payload: unknown): CallToolResult {
  return { ...jsonResult(payload), isError: true };
}

export class InvestorAnalysisMCPServer {
  readonly store: SessionStore;
  readonly pipeline: AnalysisPipeline;
  private server: Server;
  private logger: Logger;

  constructor(options: InvestorAnalysisServerOptions = {}) {
    const baseLogger = options.logger ?? createSilentLogger();
    this.logger = baseLogger.child({ component: 'server' });
    this.store = new SessionStore({ config: options.config, now: options.now });
    this.pipeline = new AnalysisPipeline(this.store, {
      extractors: options.extractors,
      analysts: options.analysts,
      logger: baseLogger,
      now: options.now
    });
    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
  }

  private setupHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: [
          // Document intake
          {
            name: 'store_document_content',
            description: 'Store pasted document text (pitch deck, memo, notes) in session memory for all specialist agents',
            inputSchema: {
              type: 'object',
              properties: {
                content: { type: 'string', description: 'Document text' },
                source_type: { type: 'string', description: 'Document kind tag, lowercase identifier (default: pitch_deck)' },
                startup_name: { type: 'string', description: 'Startup the document belongs to' }
              },
              required: ['content']
            }
          },
          {
            name: 'process_uploaded_file',
            description: `Extract text from an uploaded file and store it.\n${this.pipeline.extractors.supportedFormatsDescription()}`,
            inputSchema: {
              type: 'object',
              properties: {
                file_path: { type: 'string', description: 'Path to the uploaded file' },
                startup_name: { type: 'string', description: 'Startup the document belongs to' }
              },
              required: ['file_path']
            }
          },
          {
            name: 'process_uploaded_files',
            description: 'Extract and store several uploaded files; each file is processed independently',
            inputSchema: {
              type: 'object',
              properties: {
                file_paths: { type: 'array', items: { type: 'string' }, description: 'Paths to the uploaded files' },
                startup_name: { type: 'string', description: 'Startup the documents belong to' }
              },
              required: ['file_paths']
            }
          },

          // Memory
          {
            name: 'retrieve_all_documents',
            description: 'List every stored document, with the analyses and conversation history recorded so far',
            inputSchema: {
              type: 'object',
              properties: {
                include_content: { type: 'boolean', description: 'Return full document text instead of a preview (default: false)' }
              }
            }
          },
          {
            name: 'search_conversation_history',
            description: 'Case-insensitive search of the conversation history',
            inputSchema: {
              type: 'object',
              properties: {
                query: { type: 'string', description: 'Keyword to look for' }
              },
              required: ['query']
            }
          },
          {
            name: 'record_conversation',
            description: 'Append a user message and agent response to the conversation history',
            inputSchema: {
              type: 'object',
              properties: {
                user_message: { type: 'string', description: 'What the user asked' },
                agent_response: { type: 'string', description: 'What the assistant answered (optional)' }
              },
              required: ['user_message']
            }
          },

          // Analysis
          {
            name: 'run_specialist_analysis',
            description: 'Run a single specialist agent over the stored documents and store its result',
            inputSchema: {
              type: 'object',
              properties: {
                agent: { type: 'string', enum: [...AGENT_NAMES], description: 'Specialist agent to run' },
                startup_name: { type: 'string', description: 'Startup under analysis' },
                focus: { type: 'string', description: 'Question or market aspect to focus on (pitch deck and market agents)' },
                stage: { type: 'string', description: 'Investment stage the checklist is for (due diligence agent)' }
              },
              required: ['agent', 'startup_name']
            }
          },
          {
            name: 'auto_analyze_documents',
            description: 'Run all eight specialist agents over the stored documents and return the investor report',
            inputSchema: {
              type: 'object',
              properties: {
                startup_name: { type: 'string', description: 'Startup under analysis' },
                stage: { type: 'string', description: 'Investment stage, overrides detection from documents' }
              },
              required: ['startup_name']
            }
          },
          {
            name: 'generate_investor_report',
            description: 'Render the investor report from what is stored now, without running agents',
            inputSchema: {
              type: 'object',
              properties: {
                startup_name: { type: 'string', description: 'Startup under analysis' },
                stage: { type: 'string', description: 'Investment stage, overrides detection from documents' }
              },
              required: ['startup_name']
            }
          },
          {
            name: 'orchestrate_full_analysis',
            description: 'Describe the multi-agent workflow and what the session already holds',
            inputSchema: {
              type: 'object',
              properties: {
                startup_name: { type: 'string', description: 'Startup under analysis' }
              },
              required: ['startup_name']
            }
          },

          // Monitoring
          {
            name: 'get_session_summary',
            description: 'Counts and full contents of documents, analyses and conversation history',
            inputSchema: {
              type: 'object',
              properties: {},
              additionalProperties: false
            }
          }
        ],
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args = {} } = request.params;
      this.logger.debug({ tool: name }, 'tool call');

      try {
        switch (name) {
          case 'store_document_content':
            return this.storeDocumentContent(Validation.parseArgs(ToolArgs.StoreDocumentContentArgs, args));
          case 'process_uploaded_file':
            return await this.processUploadedFile(Validation.parseArgs(ToolArgs.ProcessUploadedFileArgs, args));
          case 'process_uploaded_files':
            return await this.processUploadedFiles(Validation.parseArgs(ToolArgs.ProcessUploadedFilesArgs, args));
          case 'retrieve_all_documents':
            return this.retrieveAllDocuments(Validation.parseArgs(ToolArgs.RetrieveAllDocumentsArgs, args));
          case 'search_conversation_history':
            return this.searchConversationHistory(Validation.parseArgs(ToolArgs.SearchConversationHistoryArgs, args));
          case 'record_conversation':
            return this.recordConversation(Validation.parseArgs(ToolArgs.RecordConversationArgs, args));
          case 'run_specialist_analysis':
            return await this.runSpecialistAnalysis(Validation.parseArgs(ToolArgs.RunSpecialistAnalysisArgs, args));
          case 'auto_analyze_documents':
            return await this.autoAnalyzeDocuments(Validation.parseArgs(ToolArgs.StartupReportArgs, args));
          case 'generate_investor_report':
            return this.generateInvestorReport(Validation.parseArgs(ToolArgs.StartupReportArgs, args));
          case 'orchestrate_full_analysis':
            return this.orchestrateFullAnalysis(Validation.parseArgs(ToolArgs.OrchestrateFullAnalysisArgs, args));
          case 'get_session_summary':
            Validation.parseArgs(ToolArgs.EmptyArgs, args);
            return jsonResult(this.store.getSummary());
          default:
            throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
        }
      } catch (error) {
        if (error instanceof McpError) {
          throw error;
        }
        this.logger.error({ tool: name, err: errorMessage(error) }, 'tool execution failed');
        throw new McpError(ErrorCode.InternalError, `Tool execution failed: ${errorMessage(error)}`);
      }
    });
  }

  // Tool implementations
  private storeDocumentContent(args: ToolArgs.StoreDocumentContentArgs): CallToolResult {
    const { content, source_type = 'pitch_deck', startup_name = '' } = args;

    Validation.validateContent(content, this.store.config);
    Validation.validateDocumentKind(source_type);

    const outcome = this.pipeline.storeContent(content, source_type, startup_name.trim());
    return outcome.status === 'error' ? errorResult(outcome) : jsonResult(outcome);
  }

  private async processUploadedFile(args: ToolArgs.ProcessUploadedFileArgs): Promise<CallToolResult> {
    const { file_path, startup_name = '' } = args;

    Validation.validateFilePath(file_path);

    const outcome = await this.pipeline.processFile(file_path, startup_name.trim());
    return outcome.status === 'error' ? errorResult(outcome) : jsonResult(outcome);
  }

  private async processUploadedFiles(args: ToolArgs.ProcessUploadedFilesArgs): Promise<CallToolResult> {
    const { file_paths, startup_name = '' } = args;

    Validation.validateFilePaths(file_paths);

    const outcome = await this.pipeline.processFiles(file_paths, startup_name.trim());
    return outcome.status === 'error' ? errorResult(outcome) : jsonResult(outcome);
  }

  private retrieveAllDocuments(args: ToolArgs.RetrieveAllDocumentsArgs): CallToolResult {
    const { include_content = false } = args;
    const { previewLength } = this.store.config;

    const documents = [...this.store.getAllDocuments()].map(doc => ({
      doc_id: doc.id,
      kind: doc.kind,
      metadata: doc.metadata,
      stored_at: doc.storedAt,
      length: doc.content.length,
      ...(include_content
        ? { content: doc.content }
        : { preview: doc.content.length > previewLength ? `${doc.content.slice(0, previewLength)}...` : doc.content })
    }));

    const analyses = this.store.getAllAnalyses();
    return jsonResult({
      status: 'success',
      total_documents: documents.length,
      documents,
      previous_analyses: Object.fromEntries(
        Object.entries(analyses).map(([subject, bySubject]) => [subject, Object.keys(bySubject)])
      ),
      complete_conversation_history: this.store.getContext().history
    });
  }

  private searchConversationHistory(args: ToolArgs.SearchConversationHistoryArgs): CallToolResult {
    const { query } = args;

    Validation.validateKeyword(query);

    const results = this.store.searchHistory(query);
    return jsonResult({
      status: 'success',
      query,
      matches: results.length,
      results
    });
  }

  private recordConversation(args: ToolArgs.RecordConversationArgs): CallToolResult {
    const { user_message, agent_response = '' } = args;

    Validation.validateMessage(user_message);

    const entry = this.store.addToHistory(user_message, agent_response);
    return jsonResult({ status: 'success', entry });
  }

  private async runSpecialistAnalysis(args: ToolArgs.RunSpecialistAnalysisArgs): Promise<CallToolResult> {
    const agent = Validation.validateAgentName(args.agent);
    const subject = Validation.validateSubject(args.startup_name);

    const outcome = await this.pipeline.runAnalyst(agent, subject, { focus: args.focus, stage: args.stage });
    if (outcome.status === 'error') return errorResult(outcome);

    return jsonResult({
      status: 'success',
      agent,
      startup_name: subject,
      run: outcome.record.run,
      result: outcome.record.result
    });
  }

  private async autoAnalyzeDocuments(args: ToolArgs.StartupReportArgs): Promise<CallToolResult> {
    const subject = Validation.validateSubject(args.startup_name);

    const outcome = await this.pipeline.autoAnalyze(subject, args.stage);
    if (outcome.status === 'error') return errorResult(outcome);

    const { report, ...summary } = outcome;
    return {
      content: [
        { type: 'text', text: report },
        { type: 'text', text: JSON.stringify(summary, null, 2) }
      ]
    };
  }

  private generateInvestorReport(args: ToolArgs.StartupReportArgs): CallToolResult {
    const subject = Validation.validateSubject(args.startup_name);

    const outcome = this.pipeline.generateReport(subject, args.stage);
    if (outcome.status === 'error') return errorResult(outcome);

    const { report, ...summary } = outcome;
    return {
      content: [
        { type: 'text', text: report },
        { type: 'text', text: JSON.stringify(summary, null, 2) }
      ]
    };
  }

  private orchestrateFullAnalysis(args: ToolArgs.OrchestrateFullAnalysisArgs): CallToolResult {
    const subject = Validation.validateSubject(args.startup_name);
    return jsonResult(this.pipeline.describeWorkflow(subject));
  }

  async connect(transport: Transport) {
    await this.server.connect(transport);
  }

  async close() {
    await this.server.close();
  }

  async run() {
    const transport = new StdioServerTransport();
    await this.connect(transport);
    this.logger.info('Investor analysis MCP server running on stdio');
  }
}
