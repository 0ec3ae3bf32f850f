export { Agent, type AgentOptions, type CompleteOptions } from './agent.js';
export { Runner, type RunOptions, type ContinueOptions, type RunnerOptions } from './runner.js';
export { StreamHandler, validateArguments, type CompletedToolCall, type StreamedTurn } from './stream-handler.js';
export * from './messages.js';
export * from './chunks.js';
export * from './types.js';
export * from './errors.js';
export {
  TRANSFER_TO_AGENT,
  TRANSFER_TO_PARENT,
  isHandoffToolName,
  findAgent,
  findParent,
  resolveTransfer,
  transferToAgentSchema,
  transferToParentSchema,
  type TransferResolution
} from './handoff.js';
export { consolidateHistoryTransfer, type MessageTransfer } from './message-transfers.js';
export {
  TranscriptRecorder,
  readTranscript,
  loadTranscriptMessages,
  type TranscriptEntry,
  type TranscriptEntryType
} from './recorder.js';
export { loadConfig, CONFIG_FILE, TANDEM_DIR, type TandemConfig, type Env } from './config.js';
export { createLogger, silentLogger, resolveLogger, formatLogLine, type LogSink } from './logger.js';
export { renderTemplate } from './template.js';
export { Retrier } from './retry.js';
