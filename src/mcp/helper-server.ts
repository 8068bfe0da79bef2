import { JsonObject } from '../core/types';
import { AgentProcess, ProcessLauncher, terminateProcess } from '../infra/process';

/**
 * A long-lived helper attached to agent sessions and handed to the agent through
 * `--mcp-config`. `start()` and `stop()` are idempotent; the counters record real transitions.
 */
export abstract class McpHelperServer {
  private running = false;
  private transition?: Promise<void>;
  private starts = 0;
  private stops = 0;

  constructor(readonly name: string) {}

  get isRunning(): boolean {
    return this.running;
  }

  get startCount(): number {
    return this.starts;
  }

  get stopCount(): number {
    return this.stops;
  }

  /** Tool names are exposed to the agent as `mcp__<server>__<tool>`. */
  get toolPrefix(): string {
    return `mcp__${this.name}__`;
  }

  async start(): Promise<void> {
    if (this.transition) await this.transition;
    if (this.running) return;

    this.transition = this.onStart().then(() => {
      this.running = true;
      this.starts++;
    });
    try {
      await this.transition;
    } finally {
      this.transition = undefined;
    }
  }

  async stop(): Promise<void> {
    if (this.transition) await this.transition;
    if (!this.running) return;

    this.transition = this.onStop().then(() => {
      this.running = false;
      this.stops++;
    });
    try {
      await this.transition;
    } finally {
      this.transition = undefined;
    }
  }

  /** Called when the server went away on its own. */
  protected markStopped(): void {
    this.running = false;
  }

  protected abstract onStart(): Promise<void>;
  protected abstract onStop(): Promise<void>;

  /** Entry for the agent's `mcpServers` configuration. */
  abstract toMcpConfig(): JsonObject;
}

export interface ProcessMcpServerOptions {
  name: string;
  command: string;
  args?: string[];
  cwd: string;
  env?: Record<string, string>;
  /** Port the helper listens on; it serves MCP over HTTP at `/mcp`. */
  port: number;
  launcher: ProcessLauncher;
  stopTimeoutMs?: number;
}

/** Helper server run as a child process speaking streamable HTTP. */
export class ProcessMcpServer extends McpHelperServer {
  private proc?: AgentProcess;

  constructor(private readonly opts: ProcessMcpServerOptions) {
    super(opts.name);
  }

  get pid(): number | undefined {
    return this.proc?.pid;
  }

  get url(): string {
    return `http://localhost:${this.opts.port}/mcp`;
  }

  protected async onStart(): Promise<void> {
    const proc = await this.opts.launcher.spawn({
      command: this.opts.command,
      args: this.opts.args ?? [],
      cwd: this.opts.cwd,
      env: { ...this.opts.env, PORT: String(this.opts.port) },
    });
    this.proc = proc;
    proc.stdout.resume();
    proc.stderr.resume();
    void proc.exited.then((code) => {
      if (this.proc !== proc) return;
      console.warn(`[mcp:${this.name}] Helper server exited with code ${code}`);
      this.proc = undefined;
      this.markStopped();
    });
  }

  protected async onStop(): Promise<void> {
    const proc = this.proc;
    this.proc = undefined;
    if (!proc) return;
    await terminateProcess(proc, this.opts.stopTimeoutMs ?? 2000);
  }

  toMcpConfig(): JsonObject {
    return { type: 'http', url: this.url };
  }
}

/** `--mcp-config` payload for a set of helper servers. */
export function mcpConfigJson(servers: readonly McpHelperServer[]): string {
  const mcpServers: JsonObject = {};
  for (const server of servers) {
    mcpServers[server.name] = server.toMcpConfig();
  }
  return JSON.stringify({ mcpServers });
}
