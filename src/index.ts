// Core
export { Session } from './core/session';
export type { SessionOptions, SessionDependencies, PermissionResponse } from './core/session';
export { SessionPool } from './core/pool';
export type { SessionPoolOptions, SpawnOptions as PoolSpawnOptions } from './core/pool';
export { EventBus } from './core/events';
export { HookManager } from './core/hooks';
export type { Hooks, HookDecision, ToolCall, ToolCallContext, ToolResultInfo } from './core/hooks';
export { EngineError, assert, errorMessage } from './core/errors';
export type { EngineErrorCode } from './core/errors';
export { EngineConfigSchema, resolveEngineConfig } from './core/config';
export type { EngineConfig, EngineConfigInput, CumulativeResetScope } from './core/config';
export { PermissionModeRegistry, permissionModes } from './core/permission-modes';
export type { PermissionModeContext, PermissionModeHandler } from './core/permission-modes';

// Types
export * from './core/types';

// Conversation
export { decodeLine, parseLine } from './core/session/decoder';
export { LineBuffer } from './core/session/line-buffer';
export { ConversationStateMachine, emptyConversation, INTERRUPTED_MESSAGE } from './core/session/conversation';
export type { ConversationDelta } from './core/session/conversation';
export { renderText } from './core/session/text';
export { toolInvocations, conversationToolInvocations, displayName } from './core/session/tool-invocations';
export type { ToolInvocation } from './core/session/tool-invocations';

// Permissions
export {
  parsePermissionPattern,
  tryParsePermissionPattern,
  compilePatterns,
  matchesPattern,
  checkPermission,
  matchesDomain,
} from './permissions/pattern';
export type { PermissionPattern } from './permissions/pattern';
export { inferPattern } from './permissions/inference';
export { isSafeBashCommand, isDangerousCommand } from './permissions/safe-commands';
export { PermissionPolicy } from './permissions/policy';
export type { PermissionPolicyOptions, RememberedPattern } from './permissions/policy';
export { ProjectRules } from './permissions/project-rules';
export type { PermissionDecision, PermissionBehavior, PermissionScope, MatchContext } from './permissions/types';

// Infrastructure
export { JSONStore } from './infra/store';
export type { Store } from './infra/store';
export { SettingsFileStore, settingsPath } from './infra/settings-store';
export type { SettingsStore, PermissionRules } from './infra/settings-store';
export { NodeProcessLauncher, terminateProcess } from './infra/process';
export type { AgentProcess, ProcessLauncher, SpawnOptions, TerminateResult } from './infra/process';
export { TranscriptLoader, agentTranscriptPath, encodeProjectDir } from './infra/transcript';

// Helper servers
export { McpHelperServer, ProcessMcpServer, mcpConfigJson } from './mcp/helper-server';
export type { ProcessMcpServerOptions } from './mcp/helper-server';
