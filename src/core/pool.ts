import { randomUUID } from 'crypto';
import { EngineError, errorMessage } from './errors';
import { EventBus } from './events';
import { Hooks } from './hooks';
import { Session, SessionDependencies } from './session';
import { SessionEvent, SessionEventKind, SessionStatus, SubscribeOptions } from './types';
import { SettingsFileStore } from '../infra/settings-store';
import { ProjectRules } from '../permissions/project-rules';

export interface SessionPoolOptions {
  dependencies: Omit<SessionDependencies, 'rules'> & { rules?: ProjectRules };
  workingDirectory: string;
  /** Id of the network, used as the pool event bus id. */
  networkId?: string;
  maxSessions?: number;
  /** Tool whose calls (with a string `initialPrompt`) spawn a sub-agent of the caller. */
  spawnToolName?: string;
  /** Registered on every session the pool creates. */
  hooks?: Hooks;
}

export interface SpawnOptions {
  sessionId?: string;
  name?: string;
  initialMessage?: string;
}

/**
 * The sessions of one agent network: a main agent and the sub-agents it spawns. All sessions
 * share the project's durable permission rules.
 */
export class SessionPool {
  readonly networkId: string;
  private sessions = new Map<string, Session>();
  /** Ids whose session is still being created or resumed; they count toward capacity. */
  private reserved = new Set<string>();
  private parents = new Map<string, string | undefined>();
  private detachers = new Map<string, () => void>();
  private readonly events: EventBus;
  private readonly deps: SessionDependencies;
  private readonly workingDirectory: string;
  private readonly maxSessions: number;
  private readonly spawnToolName?: string;
  private readonly hooks?: Hooks;

  constructor(opts: SessionPoolOptions) {
    this.networkId = opts.networkId ?? randomUUID();
    this.workingDirectory = opts.workingDirectory;
    this.deps = {
      ...opts.dependencies,
      rules: opts.dependencies.rules ?? new ProjectRules(new SettingsFileStore(opts.workingDirectory)),
    };
    this.maxSessions = opts.maxSessions || 50;
    this.spawnToolName = opts.spawnToolName;
    this.hooks = opts.hooks;
    this.events = new EventBus(this.networkId);
  }

  /** Create the network's main agent. */
  async create(options: SpawnOptions = {}): Promise<Session> {
    return this.add(undefined, options);
  }

  /** Create a sub-agent of `parentId`. */
  async spawn(parentId: string, options: SpawnOptions = {}): Promise<Session> {
    if (!this.sessions.has(parentId)) {
      throw new EngineError('SESSION_NOT_FOUND', `Parent session not found: ${parentId}`);
    }
    return this.add(parentId, options);
  }

  /** Re-open a stored session into the pool. */
  async resume(sessionId: string): Promise<Session> {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;
    this.reserve(sessionId);

    let session: Session;
    try {
      session = await Session.resume(sessionId, this.deps, this.hooks);
    } finally {
      this.reserved.delete(sessionId);
    }
    this.track(session, session.info().parentId);
    return session;
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  list(opts?: { prefix?: string }): string[] {
    const ids = Array.from(this.sessions.keys());
    const prefix = opts?.prefix;
    return prefix ? ids.filter((id) => id.startsWith(prefix)) : ids;
  }

  children(sessionId: string): string[] {
    return Array.from(this.parents.entries())
      .filter(([, parent]) => parent === sessionId)
      .map(([id]) => id);
  }

  status(sessionId: string): SessionStatus | undefined {
    return this.sessions.get(sessionId)?.status();
  }

  size(): number {
    return this.sessions.size;
  }

  subscribe(opts?: SubscribeOptions): AsyncIterable<SessionEvent> {
    return this.events.subscribe(opts);
  }

  on<K extends SessionEventKind>(kind: K, listener: (event: Extract<SessionEvent, { type: K }>) => void): () => void {
    return this.events.onEvent(kind, listener);
  }

  /** Close a session and its sub-agents. */
  async terminate(sessionId: string, reason = 'terminated'): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new EngineError('SESSION_NOT_FOUND', `Session not found: ${sessionId}`);
    }

    for (const child of this.children(sessionId)) {
      await this.terminate(child, `parent ${reason}`);
    }

    this.sessions.delete(sessionId);
    this.parents.delete(sessionId);
    this.detachers.get(sessionId)?.();
    this.detachers.delete(sessionId);
    await session.close();
    this.events.emitEvent({ type: 'agent-terminated', agentId: sessionId, reason });
  }

  /** Terminate every session; with `purge`, also remove their stored data. */
  async delete(opts: { purge?: boolean } = {}): Promise<void> {
    const roots = this.list().filter((id) => this.parents.get(id) === undefined);
    const ids = this.list();
    for (const id of roots) {
      await this.terminate(id, 'network deleted');
    }
    for (const id of this.list()) {
      await this.terminate(id, 'network deleted');
    }
    if (opts.purge) {
      for (const id of ids) {
        await this.deps.store.delete(id);
      }
    }
    this.events.close();
  }

  /** Claim an id and a slot before any await, so concurrent adds cannot overshoot. */
  private reserve(sessionId: string): void {
    if (this.sessions.has(sessionId) || this.reserved.has(sessionId)) {
      throw new EngineError('SESSION_EXISTS', `Session already exists: ${sessionId}`);
    }
    if (this.sessions.size + this.reserved.size >= this.maxSessions) {
      throw new EngineError('POOL_FULL', `Pool is full (max ${this.maxSessions} sessions)`);
    }
    this.reserved.add(sessionId);
  }

  private async add(parentId: string | undefined, options: SpawnOptions): Promise<Session> {
    const sessionId = options.sessionId ?? randomUUID();
    this.reserve(sessionId);

    let session: Session;
    try {
      session = await Session.create(
        {
          sessionId,
          workingDirectory: this.workingDirectory,
          name: options.name,
          parentId,
          hooks: this.hooks,
        },
        this.deps
      );
    } finally {
      this.reserved.delete(sessionId);
    }
    this.track(session, parentId);
    this.events.emitEvent({ type: 'agent-spawned', agentId: session.id, parentId, name: options.name });

    if (options.initialMessage) {
      await session.sendMessage(options.initialMessage);
    }
    return session;
  }

  private track(session: Session, parentId: string | undefined): void {
    this.sessions.set(session.id, session);
    this.parents.set(session.id, parentId);

    const spawnTool = this.spawnToolName;
    if (!spawnTool) return;
    const detach = session.on('tool-use', (event) => {
      if (event.toolName !== spawnTool) return;
      const prompt = event.parameters.initialPrompt;
      if (typeof prompt !== 'string') return;
      const name = typeof event.parameters.name === 'string' ? event.parameters.name : undefined;
      this.spawn(session.id, { name, initialMessage: prompt }).catch((err) => {
        console.error(`[pool:${this.networkId}] Failed to spawn sub-agent for ${session.id}: ${errorMessage(err)}`);
      });
    });
    this.detachers.set(session.id, detach);
  }
}
