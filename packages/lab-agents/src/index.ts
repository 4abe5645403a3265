export { Transcript, formatToolFailure, surfaceToolFailures, type RecordedTurn } from './services/transcript'
export { extractVerdict, detectStopToken, stripTokens, NO_EXPLICIT_VERDICT, type VerdictResult, type VerdictTokens } from './services/verdict'
export { createAgentParticipant, type Participant, type TaskContext, type TurnGenerator } from './services/participant'
export { runRoundRobinChat, type SubChatOptions, type SubChatResult } from './services/round-robin-chat'
export { RevisionCycle, type RevisionCycleOptions, type RevisionOutcome, type RevisionTransition } from './services/revision-loop'
export { LabOrchestrator, type LabOrchestratorOptions, type LabRunResult } from './services/lab-orchestrator'
export {
  NotebookStoreError,
  createInMemoryNotebookStore,
  createFileNotebookStore,
  createPostgresNotebookStore,
  renderNotebook,
  condenseNotebook,
  type NotebookStore
} from './services/notebook-store'
export { ToolGateway, ToolFailure, type ToolDefinition, type ToolContext } from './services/tool-gateway'
export { AgentRuntime } from './services/agent-runtime'
export { loadRunConfig } from './services/run-config'
export { createLab, type Lab } from './services/lab-container'
export { loadRoleRegistry, createRoleRegistry, type RoleRegistry } from './agents/role-registry'
export { loadTask, type ResearchTask } from './agents/task-registry'
export { createCodeExecutor, extractCodeBlocks } from './agents/code-executor'
export { getLogger, genCorrelationId } from './services/logger'
