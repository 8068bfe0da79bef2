import { randomUUID } from 'crypto';
import { EngineConfig } from './config';
import { EngineError, EngineErrorCode, assert, errorMessage } from './errors';
import { EventBus } from './events';
import { HookDecision, HookManager, Hooks, RegisteredHook, ToolCall, ToolCallContext } from './hooks';
import { PermissionModeRegistry } from './permission-modes';
import {
  Attachment,
  Conversation,
  HistorySource,
  JsonObject,
  SessionEvent,
  SessionEventKind,
  SessionInfo,
  SessionState,
  SessionStatus,
  SubscribeOptions,
} from './types';
import { buildUserContent } from './session/attachments';
import {
  ControlRequest,
  PermissionResult,
  errorResponse,
  parseControlRequest,
  permissionResponse,
  userMessageLine,
} from './session/control';
import { ConversationDelta, ConversationStateMachine, INTERRUPTED_MESSAGE } from './session/conversation';
import { decodeLine, parseLine } from './session/decoder';
import { LineBuffer } from './session/line-buffer';
import { OutgoingMessage, Outbox } from './session/outbox';
import { AgentProcess, ProcessLauncher, terminateProcess } from '../infra/process';
import { Store } from '../infra/store';
import { TranscriptLoader } from '../infra/transcript';
import { McpHelperServer, mcpConfigJson } from '../mcp/helper-server';
import { PermissionPolicy, RememberedPattern } from '../permissions/policy';
import { ProjectRules } from '../permissions/project-rules';

export interface SessionOptions {
  sessionId?: string;
  workingDirectory: string;
  name?: string;
  parentId?: string;
  /** Agent-side session to resume with `--resume`. */
  agentSessionId?: string;
  hooks?: Hooks;
}

export interface SessionDependencies {
  config: EngineConfig;
  store: Store;
  launcher: ProcessLauncher;
  /** Durable allow/deny lists of the project the session works in. */
  rules: ProjectRules;
  transcripts?: TranscriptLoader;
  helperServers?: McpHelperServer[];
  modes?: PermissionModeRegistry;
}

export interface PermissionResponse {
  behavior: 'allow' | 'deny';
  /** Store a pattern so equivalent calls are allowed without asking. */
  remember?: boolean;
  /** Pattern to remember instead of the inferred one. */
  pattern?: string;
  message?: string;
  updatedInput?: JsonObject;
}

interface PendingPermission {
  toolName: string;
  input: JsonObject;
  timer: NodeJS.Timeout;
  resolve: (result: PermissionResult) => void;
}

const PROTOCOL_ARGS = [
  '--output-format',
  'stream-json',
  '--input-format',
  'stream-json',
  '--verbose',
  '--include-partial-messages',
  '--permission-prompt-tool',
  'stdio',
];

/**
 * One agent subprocess and its conversation. Output lines are decoded and folded into the
 * conversation strictly in arrival order; tool permission requests are answered through the
 * policy, hooks or a human via `respondToPermission`.
 */
export class Session {
  private readonly events: EventBus;
  private readonly hooks = new HookManager();
  private readonly policy: PermissionPolicy;
  private readonly outbox = new Outbox();
  private readonly pending = new Map<string, PendingPermission>();
  private readonly helpers: McpHelperServer[];
  private sessionInfo: SessionInfo;
  private machine: ConversationStateMachine;

  private state: SessionState = 'IDLE';
  private proc?: AgentProcess;
  private spawning?: Promise<AgentProcess>;
  private delivering?: Promise<void>;
  private lineBuffer = new LineBuffer();
  private turnInFlight = false;
  private aborting = false;
  private closed = false;
  private startFailure?: string;

  private constructor(info: SessionInfo, private readonly deps: SessionDependencies, hooks?: Hooks) {
    this.sessionInfo = info;
    this.helpers = deps.helperServers ?? [];
    this.events = new EventBus(info.sessionId);
    this.events.setStore(deps.store);
    this.machine = new ConversationStateMachine(deps.config.cumulativeResetScope);
    this.policy = new PermissionPolicy({
      cwd: info.workingDirectory,
      rules: deps.rules,
      askUserBehavior: deps.config.askUserBehavior,
      internalToolPrefixes: [...deps.config.internalToolPrefixes, ...this.helpers.map((server) => server.toolPrefix)],
      blockedTools: deps.config.blockedTools,
      modes: deps.modes,
      respectGitignore: deps.config.respectGitignore,
    });
    if (hooks) this.hooks.register(hooks, 'session');
  }

  static async create(options: SessionOptions, deps: SessionDependencies): Promise<Session> {
    const info: SessionInfo = {
      sessionId: options.sessionId ?? randomUUID(),
      workingDirectory: options.workingDirectory,
      agentSessionId: options.agentSessionId,
      parentId: options.parentId,
      name: options.name,
      createdAt: new Date().toISOString(),
    };
    const session = new Session(info, deps, options.hooks);
    await session.policy.load();
    await deps.store.saveInfo(info.sessionId, info);
    if (info.agentSessionId) {
      await session.loadHistory();
    }
    return session;
  }

  /** Re-open a session persisted in the store and reload its history. */
  static async resume(sessionId: string, deps: SessionDependencies, hooks?: Hooks): Promise<Session> {
    const info = await deps.store.loadInfo(sessionId);
    if (!info) {
      throw new EngineError('SESSION_NOT_FOUND', `Session not found in store: ${sessionId}`);
    }
    const session = new Session(info, deps, hooks);
    await session.policy.load();

    let lastSeq = -1;
    for await (const entry of deps.store.readEvents(sessionId)) {
      lastSeq = Math.max(lastSeq, entry.seq);
    }
    session.events.continueFrom(lastSeq + 1);

    await session.loadHistory();
    return session;
  }

  get id(): string {
    return this.sessionInfo.sessionId;
  }

  get workingDirectory(): string {
    return this.sessionInfo.workingDirectory;
  }

  get currentState(): SessionState {
    return this.state;
  }

  get isAborting(): boolean {
    return this.aborting;
  }

  get isRunning(): boolean {
    return this.proc !== undefined && !this.proc.hasExited;
  }

  /** Copy of the conversation so far. */
  get conversation(): Conversation {
    return this.machine.snapshot();
  }

  get queuedMessage(): OutgoingMessage | undefined {
    return this.outbox.peek();
  }

  info(): SessionInfo {
    return { ...this.sessionInfo };
  }

  status(): SessionStatus {
    return {
      sessionId: this.id,
      state: this.state,
      isAborting: this.aborting,
      isRunning: this.isRunning,
      hasQueuedMessage: this.outbox.hasPending,
      messageCount: this.machine.current.messages.length,
      pendingPermissions: this.pending.size,
      seq: this.events.getSeq(),
    };
  }

  subscribe(opts?: SubscribeOptions): AsyncIterable<SessionEvent> {
    return this.events.subscribe(opts);
  }

  on<K extends SessionEventKind>(kind: K, listener: (event: Extract<SessionEvent, { type: K }>) => void): () => void {
    return this.events.onEvent(kind, listener);
  }

  history(opts?: { since?: number; limit?: number }): SessionEvent[] {
    const timeline = this.events.getTimeline(opts?.since);
    const limited = opts?.limit ? timeline.slice(0, opts.limit) : timeline;
    return limited.map((t) => t.event);
  }

  use(hooks: Hooks): this {
    this.hooks.register(hooks, 'session');
    return this;
  }

  getHooks(): ReadonlyArray<RegisteredHook> {
    return this.hooks.getRegistered();
  }

  /** Arguments the agent CLI is started with. */
  spawnArgs(): string[] {
    const { config } = this.deps;
    const args = [...PROTOCOL_ARGS];
    if (config.model) args.push('--model', config.model);
    const agentSessionId = this.machine.current.agentSessionId ?? this.sessionInfo.agentSessionId;
    if (agentSessionId) args.push('--resume', agentSessionId);
    if (this.helpers.length > 0) args.push('--mcp-config', mcpConfigJson(this.helpers));
    return [...args, ...config.args];
  }

  /**
   * Send a user turn. Starts the agent on first use. While a turn is in flight the message is
   * held in a single slot; a later message replaces an earlier one still waiting.
   */
  async sendMessage(text: string, attachments: Attachment[] = []): Promise<void> {
    assert(!this.closed, 'SESSION_CLOSED', `Session ${this.id} is closed`);
    if (!text.trim() && attachments.length === 0) return;

    if (this.startFailure !== undefined) {
      const message = `Agent process failed to start (${this.startFailure}); restart the session first`;
      console.error(`[session:${this.id}] ${message}`);
      this.events.emitEvent({ type: 'error', message, code: 'PROCESS_START_FAILED' });
      return;
    }

    const message: OutgoingMessage = { text, attachments };
    if (this.turnInFlight || this.aborting) {
      const replaced = this.outbox.offer(message);
      if (replaced) {
        console.warn(`[session:${this.id}] Queued message replaced by a newer one`);
      }
      return;
    }

    await this.dispatch(message);
  }

  /** Drop the queued message, if any. */
  clearQueuedMessage(): boolean {
    const had = this.outbox.hasPending;
    this.outbox.clear();
    return had;
  }

  /**
   * Stop the running turn: SIGTERM, then SIGKILL after `abortTimeoutMs`. Appends an interruption
   * marker and returns to Idle. No-op when no process is running.
   */
  async abort(): Promise<void> {
    if (this.aborting) return;
    const delivering = this.delivering;
    if (delivering) {
      // A message still being spawned for or written is delivered first, then interrupted.
      await delivering;
      if (this.aborting) return;
    }
    const proc = this.proc;
    if (!proc) return;

    this.aborting = true;
    try {
      this.denyAllPending(INTERRUPTED_MESSAGE);
      const result = await terminateProcess(proc, this.deps.config.abortTimeoutMs);
      if (this.proc === proc) this.detach();
      this.applyDelta(this.machine.markAborted());
      this.events.emitEvent({ type: 'aborted', exitCode: result.exitCode, forced: result.forced });
    } finally {
      this.aborting = false;
    }
    this.endTurn();
  }

  /**
   * Tear down the process, clear the queue and any start failure, and rebuild the conversation
   * from the persisted transcript.
   */
  async restart(): Promise<void> {
    assert(!this.closed, 'SESSION_CLOSED', `Session ${this.id} is closed`);
    const proc = this.proc;
    this.proc = undefined;
    this.outbox.clear();
    this.denyAllPending('Session restarted');
    if (proc) {
      await terminateProcess(proc, this.deps.config.abortTimeoutMs);
    }

    this.lineBuffer = new LineBuffer();
    this.turnInFlight = false;
    this.startFailure = undefined;
    await this.loadHistory();
    this.setState('IDLE', 'restarted');
  }

  /** Abort, deny pending permission requests, stop helper servers and end subscriptions. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.outbox.clear();
    await this.abort();
    this.denyAllPending('Session closed');
    for (const server of this.helpers) {
      try {
        await server.stop();
      } catch (err) {
        console.warn(`[session:${this.id}] Failed to stop helper server ${server.name}:`, err);
      }
    }
    this.events.close();
  }

  /**
   * Answer a pending `permission-request`. Throws `PERMISSION_REQUEST_NOT_FOUND` for an
   * unknown or already answered request.
   */
  async respondToPermission(requestId: string, response: PermissionResponse): Promise<RememberedPattern | undefined> {
    const pending = this.pending.get(requestId);
    if (!pending) {
      throw new EngineError('PERMISSION_REQUEST_NOT_FOUND', `Permission request not found: ${requestId}`);
    }
    this.pending.delete(requestId);
    clearTimeout(pending.timer);

    let remembered: RememberedPattern | undefined;
    if (response.behavior === 'allow' && response.remember) {
      try {
        remembered = await this.policy.remember(pending.toolName, pending.input, response.pattern);
      } catch (err) {
        console.warn(`[session:${this.id}] Could not remember permission:`, errorMessage(err));
      }
    }

    pending.resolve(
      response.behavior === 'allow'
        ? { behavior: 'allow', updatedInput: response.updatedInput ?? pending.input }
        : { behavior: 'deny', message: response.message ?? 'Denied by user' }
    );
    return remembered;
  }

  // ---------------------------------------------------------------------------
  // Turns

  private async dispatch(message: OutgoingMessage): Promise<void> {
    const delivery = this.deliver(message);
    this.delivering = delivery;
    try {
      await delivery;
    } finally {
      if (this.delivering === delivery) this.delivering = undefined;
    }
  }

  /** Start the process if needed and write the user turn. Failures are recorded, not thrown. */
  private async deliver(message: OutgoingMessage): Promise<void> {
    this.turnInFlight = true;
    this.machine.clearError();
    this.applyDelta(
      this.machine.addUserMessage(message.text, message.attachments.length > 0 ? message.attachments : undefined)
    );
    this.setState('SENDING_MESSAGE');

    let proc: AgentProcess;
    try {
      proc = await this.ensureProcess();
    } catch (err) {
      this.failStart(err);
      return;
    }

    let content: JsonObject[];
    try {
      content = await buildUserContent(message.text, message.attachments, this.workingDirectory);
    } catch (err) {
      this.failSend(err, 'ATTACHMENT_READ');
      return;
    }

    try {
      const line = userMessageLine(content);
      this.appendTranscript(line.trimEnd());
      await this.write(proc, line);
    } catch (err) {
      this.failSend(err, 'PROCESS_NOT_RUNNING');
      return;
    }

    if (this.state === 'SENDING_MESSAGE') this.setState('PROCESSING');
  }

  private failSend(err: unknown, code: EngineErrorCode): void {
    console.error(`[session:${this.id}] Failed to send message:`, err);
    this.applyDelta(this.machine.recordError(`Failed to send message: ${errorMessage(err)}`), code);
    this.endTurn();
  }

  private failStart(err: unknown): void {
    const message = errorMessage(err);
    this.startFailure = message;
    console.error(`[session:${this.id}] Failed to start agent process: ${message}`);
    if (this.outbox.take()) {
      console.warn(`[session:${this.id}] Dropping queued message after start failure`);
    }
    this.applyDelta(this.machine.recordError(message), 'PROCESS_START_FAILED');
    this.endTurn();
  }

  private endTurn(): void {
    this.turnInFlight = false;
    if (this.aborting) return;

    this.hooks.runMessagesChanged(this.machine.snapshot()).catch((err) => {
      console.error(`[session:${this.id}] messagesChanged hook failed:`, err);
    });

    const next = this.outbox.take();
    if (next && !this.closed && this.startFailure === undefined) {
      this.dispatch(next).catch((err) => {
        console.error(`[session:${this.id}] Failed to dispatch queued message:`, err);
      });
    }
  }

  private setState(next: SessionState, detail?: string): void {
    if (next === this.state) return;
    const previous = this.state;
    this.state = next;
    this.events.emitEvent({ type: 'status', state: next, previous, detail });
  }

  /** Publish what a conversation update changed, then follow its state transition. */
  private applyDelta(delta: ConversationDelta, errorCode?: EngineErrorCode): void {
    for (const message of delta.changed) {
      this.events.emitEvent({
        type: 'message',
        message: structuredClone(message),
        isNew: delta.createdIds.includes(message.id),
      });
    }

    if (delta.toolUse) {
      const { fragment, messageId } = delta.toolUse;
      this.events.emitEvent({
        type: 'tool-use',
        toolUseId: fragment.toolUseId,
        toolName: fragment.toolName,
        parameters: fragment.parameters,
        messageId,
      });
    }

    if (delta.toolResult) {
      const { fragment, orphaned } = delta.toolResult;
      if (orphaned) {
        console.warn(`[session:${this.id}] Tool result ${fragment.toolUseId} has no matching tool use`);
      }
      this.events.emitEvent({
        type: 'tool-result',
        toolUseId: fragment.toolUseId,
        content: fragment.content,
        isError: fragment.isError,
        orphaned,
      });
      const result = { toolUseId: fragment.toolUseId, content: fragment.content, isError: fragment.isError };
      this.hooks.runPostToolUse(result, this.hookContext()).catch((err) => {
        console.error(`[session:${this.id}] postToolUse hook failed:`, err);
      });
    }

    if (delta.status && delta.status.subtype !== 'message_start') {
      this.events.emitEvent({ type: 'status', state: this.state, detail: delta.status.message ?? delta.status.subtype });
    }

    if (delta.unknown) {
      this.events.emitEvent({ type: 'unknown', wireType: delta.unknown.type, raw: delta.unknown.raw });
    }

    if (delta.error !== undefined) {
      this.setState('ERROR');
      this.events.emitEvent({ type: 'error', message: delta.error, code: errorCode });
      this.setState('IDLE');
    } else if (delta.nextState) {
      this.setState(delta.nextState);
    }

    if (delta.completion) {
      const c = this.machine.current;
      this.events.emitEvent({
        type: 'done',
        stopReason: delta.completion.stopReason,
        totals: {
          totalInputTokens: c.totalInputTokens,
          totalOutputTokens: c.totalOutputTokens,
          totalCacheReadTokens: c.totalCacheReadTokens,
          totalCacheCreationTokens: c.totalCacheCreationTokens,
          totalCostUsd: c.totalCostUsd,
        },
      });
    }

    // The turn ends with the agent's result line, which follows an end_turn message.
    if (delta.completion) this.endTurn();
  }

  // ---------------------------------------------------------------------------
  // Process

  private ensureProcess(): Promise<AgentProcess> {
    if (this.proc && !this.proc.hasExited) return Promise.resolve(this.proc);
    if (!this.spawning) {
      this.spawning = this.spawnProcess().finally(() => {
        this.spawning = undefined;
      });
    }
    return this.spawning;
  }

  private async spawnProcess(): Promise<AgentProcess> {
    for (const server of this.helpers) {
      if (server.isRunning) continue;
      await server.start();
    }

    const { config } = this.deps;
    const proc = await this.deps.launcher.spawn({
      command: config.command,
      args: this.spawnArgs(),
      cwd: this.workingDirectory,
      env: config.env,
    });
    this.attach(proc);
    this.events.emitEvent({
      type: 'connected',
      pid: proc.pid,
      agentSessionId: this.machine.current.agentSessionId ?? this.sessionInfo.agentSessionId,
    });
    return proc;
  }

  private attach(proc: AgentProcess): void {
    this.proc = proc;
    this.lineBuffer = new LineBuffer();

    proc.stdout.on('data', (chunk: Buffer | string) => {
      if (proc !== this.proc) return;
      for (const line of this.lineBuffer.push(chunk.toString())) {
        this.handleLine(line);
      }
    });
    proc.stderr.on('data', (chunk: Buffer | string) => {
      if (this.deps.config.debug) {
        console.error(`[session:${this.id}] stderr: ${chunk.toString().trimEnd()}`);
      }
    });
    proc.stdin.on('error', (err) => {
      console.error(`[session:${this.id}] stdin error:`, err);
    });
    proc.exited
      .then((code) => this.onExit(proc, code))
      .catch((err) => {
        console.error(`[session:${this.id}] Failed to handle process exit:`, err);
      });
  }

  /** Flush buffered output and forget the process. */
  private detach(): void {
    for (const line of this.lineBuffer.flush()) {
      this.handleLine(line);
    }
    this.proc = undefined;
  }

  private onExit(proc: AgentProcess, code: number | null): void {
    if (proc !== this.proc) return;
    this.detach();
    if (this.aborting) return;

    this.denyAllPending('Agent process exited');
    if (this.turnInFlight) {
      this.applyDelta(
        this.machine.recordError(`Agent process exited unexpectedly (code ${code ?? 'null'})`),
        'PROCESS_NOT_RUNNING'
      );
      this.endTurn();
    }
  }

  private write(proc: AgentProcess, line: string): Promise<void> {
    return new Promise((resolve, reject) => {
      proc.stdin.write(line, (err) => (err ? reject(err) : resolve()));
    });
  }

  private handleLine(line: string): void {
    let control: ControlRequest | undefined;
    try {
      control = parseControlRequest(line);
    } catch (err) {
      this.rejectMalformedControl(line, err);
      return;
    }
    if (control) {
      this.handleControlRequest(control).catch((err) => {
        console.error(`[session:${this.id}] Failed to answer control request:`, err);
      });
      return;
    }

    this.appendTranscript(line);
    const fragments = decodeLine(line, {
      onMalformed: (raw) => console.warn(`[session:${this.id}] Skipping malformed line: ${raw.slice(0, 200)}`),
    });
    for (const fragment of fragments) {
      this.applyDelta(this.machine.apply(fragment));
    }
    this.syncAgentSessionId();
  }

  private appendTranscript(line: string): void {
    this.deps.store.appendTranscript(this.id, line).catch((err) => {
      console.error(`[session:${this.id}] Failed to persist transcript line:`, err);
    });
  }

  private syncAgentSessionId(): void {
    const agentSessionId = this.machine.current.agentSessionId;
    if (!agentSessionId || agentSessionId === this.sessionInfo.agentSessionId) return;
    this.sessionInfo = { ...this.sessionInfo, agentSessionId };
    this.deps.store.saveInfo(this.id, this.sessionInfo).catch((err) => {
      console.error(`[session:${this.id}] Failed to save session info:`, err);
    });
  }

  private async loadHistory(): Promise<void> {
    let source: HistorySource = 'none';
    let lines = await this.deps.store.readTranscript(this.id);
    if (lines.length > 0) {
      source = 'store';
    } else if (this.sessionInfo.agentSessionId && this.deps.transcripts) {
      try {
        const loaded = await this.deps.transcripts.load(this.workingDirectory, this.sessionInfo.agentSessionId);
        if (loaded) {
          lines = loaded;
          source = 'agent-transcript';
        }
      } catch (err) {
        const error = new EngineError('CONVERSATION_LOAD', `Failed to load agent transcript: ${errorMessage(err)}`, err);
        console.warn(`[session:${this.id}] ${error.message}`);
      }
    }

    const machine = new ConversationStateMachine(this.deps.config.cumulativeResetScope);
    for (const line of lines) {
      for (const fragment of decodeLine(line)) {
        machine.apply(fragment);
      }
    }
    machine.settle();
    machine.clearError();
    this.machine = machine;
    this.syncAgentSessionId();

    this.events.emitEvent({ type: 'history', source, messages: machine.snapshot().messages });
  }

  // ---------------------------------------------------------------------------
  // Permissions

  private hookContext(): ToolCallContext {
    return { sessionId: this.id, workingDirectory: this.workingDirectory };
  }

  private async handleControlRequest(request: ControlRequest): Promise<void> {
    if (request.kind === 'unsupported') {
      await this.writeControl(errorResponse(request.requestId, `Unsupported control request: ${request.subtype}`));
      return;
    }
    const result = await this.decide(request);
    await this.writeControl(permissionResponse(request.requestId, result));
  }

  private rejectMalformedControl(line: string, err: unknown): void {
    const error = new EngineError('CONTROL_PROTOCOL', `Malformed control request: ${errorMessage(err)}`, err);
    console.warn(`[session:${this.id}] ${error.message}`);
    const payload = parseLine(line);
    const requestId = payload?.request_id;
    if (typeof requestId === 'string') {
      this.writeControl(errorResponse(requestId, error.message)).catch((writeErr) => {
        console.error(`[session:${this.id}] Failed to reject control request:`, writeErr);
      });
    }
  }

  private async writeControl(line: string): Promise<void> {
    const proc = this.proc;
    if (!proc || proc.hasExited) {
      if (this.deps.config.debug) {
        console.warn(`[session:${this.id}] Dropping control response, no running process`);
      }
      return;
    }
    await this.write(proc, line);
  }

  private async decide(request: Extract<ControlRequest, { kind: 'can-use-tool' }>): Promise<PermissionResult> {
    const call: ToolCall = {
      requestId: request.requestId,
      toolName: request.toolName,
      input: request.input,
      toolUseId: request.toolUseId,
    };

    let hookDecision: HookDecision;
    try {
      hookDecision = await this.hooks.runPreToolUse(call, this.hookContext());
    } catch (err) {
      console.error(`[session:${this.id}] preToolUse hook failed:`, err);
      return { behavior: 'deny', message: `Permission hook failed: ${errorMessage(err)}` };
    }
    if (hookDecision) {
      return hookDecision.behavior === 'allow'
        ? { behavior: 'allow', updatedInput: hookDecision.updatedInput ?? request.input }
        : { behavior: 'deny', message: hookDecision.reason ?? 'Denied by hook' };
    }

    const decision = this.policy.evaluate(request.toolName, request.input);
    switch (decision.behavior) {
      case 'allow':
        return { behavior: 'allow', updatedInput: request.input };
      case 'deny':
        return { behavior: 'deny', message: decision.reason };
      case 'ask':
        return this.askUser(request, decision.reason, decision.inferredPattern ?? request.toolName);
    }
  }

  private askUser(
    request: Extract<ControlRequest, { kind: 'can-use-tool' }>,
    reason: string,
    inferredPattern: string
  ): Promise<PermissionResult> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        if (!this.pending.delete(request.requestId)) return;
        this.events.emitEvent({ type: 'permission-timeout', requestId: request.requestId, toolName: request.toolName });
        resolve({ behavior: 'deny', message: 'Permission request timed out' });
      }, this.deps.config.permissionTimeoutMs);

      this.pending.set(request.requestId, { toolName: request.toolName, input: request.input, timer, resolve });
      this.events.emitEvent({
        type: 'permission-request',
        requestId: request.requestId,
        toolName: request.toolName,
        input: request.input,
        inferredPattern,
        reason,
      });
    });
  }

  private denyAllPending(message: string): void {
    for (const pending of this.pending.values()) {
      clearTimeout(pending.timer);
      pending.resolve({ behavior: 'deny', message });
    }
    this.pending.clear();
  }
}
