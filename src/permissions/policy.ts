import path from 'path';
import { errorMessage } from '../core/errors';
import { PermissionModeRegistry, permissionModes } from '../core/permission-modes';
import { JsonObject } from '../core/types';
import { GitignoreMatcher } from './gitignore';
import { inferPattern } from './inference';
import { PermissionPattern, findMatch, hasPathTraversal, normalizePath, parsePermissionPattern } from './pattern';
import { ProjectRules } from './project-rules';
import { isDangerousCommand, isSafeBashCommand } from './safe-commands';
import { isWriteTool, parseToolInput } from './tool-input';
import { PermissionDecision, PermissionScope } from './types';

const INTERNAL_TOOLS = new Set(['TodoWrite', 'BashOutput', 'KillShell', 'KillBash']);

export interface PermissionPolicyOptions {
  cwd: string;
  rules: ProjectRules;
  /** Permission mode consulted when no rule decides; defaults to `ask`. */
  askUserBehavior?: string;
  internalToolPrefixes?: string[];
  blockedTools?: string[];
  modes?: PermissionModeRegistry;
  /** Deny `Read` of paths ignored by `<cwd>/.gitignore`, read once by `load`. */
  respectGitignore?: boolean;
}

export interface RememberedPattern {
  pattern: string;
  scope: PermissionScope;
}

/**
 * Per-session permission decisions. Holds the session-scoped cache for write tools and reads
 * the project's durable lists through the shared `ProjectRules`.
 */
export class PermissionPolicy {
  private readonly cwd: string;
  private readonly rules: ProjectRules;
  private readonly mode: string;
  private readonly internalPrefixes: string[];
  private readonly blocked: Set<string>;
  private readonly modes: PermissionModeRegistry;
  private readonly respectGitignore: boolean;
  private gitignore?: GitignoreMatcher;
  private sessionCache: PermissionPattern[] = [];

  constructor(options: PermissionPolicyOptions) {
    this.cwd = normalizePath(options.cwd);
    this.rules = options.rules;
    this.mode = options.askUserBehavior ?? 'ask';
    this.internalPrefixes = options.internalToolPrefixes ?? [];
    this.blocked = new Set(options.blockedTools ?? []);
    this.modes = options.modes ?? permissionModes;
    this.respectGitignore = options.respectGitignore ?? false;
  }

  async load(): Promise<void> {
    await this.rules.load();
    if (this.respectGitignore && !this.gitignore) {
      try {
        this.gitignore = await GitignoreMatcher.load(this.cwd);
      } catch (error) {
        console.warn(`[permissions] Could not read .gitignore in ${this.cwd}: ${errorMessage(error)}`);
      }
    }
  }

  evaluate(toolName: string, input: JsonObject): PermissionDecision {
    const ctx = { cwd: this.cwd };

    if (this.blocked.has(toolName)) {
      return { behavior: 'deny', reason: `Tool ${toolName} is blocked` };
    }

    const parsed = parseToolInput(toolName, input);
    if (parsed.kind === 'bash' && parsed.command !== undefined && isDangerousCommand(parsed.command)) {
      return { behavior: 'deny', reason: 'Command matches a dangerous pattern' };
    }

    if (parsed.kind === 'file' && parsed.tool === 'Read' && parsed.filePath && this.gitignore?.ignores(parsed.filePath)) {
      return { behavior: 'deny', reason: 'Blocked by .gitignore' };
    }

    if (this.isInternalTool(toolName)) {
      return { behavior: 'allow', reason: 'Internal tool' };
    }

    if (this.isReadInsideWorkingDir(toolName, input)) {
      return { behavior: 'allow', reason: 'Read-only access inside the working directory' };
    }

    const denied = findMatch(this.rules.deny, toolName, input, ctx);
    if (denied) {
      return { behavior: 'deny', reason: `Matched deny pattern ${denied.raw}`, matchedPattern: denied.raw };
    }

    if (parsed.kind === 'bash' && parsed.command !== undefined && isSafeBashCommand(parsed.command, this.cwd)) {
      return { behavior: 'allow', reason: 'Read-only command' };
    }

    const cached = findMatch(this.sessionCache, toolName, input, ctx);
    if (cached) {
      return { behavior: 'allow', reason: `Matched session pattern ${cached.raw}`, matchedPattern: cached.raw };
    }

    const allowed = findMatch(this.rules.allow, toolName, input, ctx);
    if (allowed) {
      return { behavior: 'allow', reason: `Matched allow pattern ${allowed.raw}`, matchedPattern: allowed.raw };
    }

    const inferredPattern = inferPattern(toolName, input);
    const remember = { pattern: inferredPattern, scope: this.scopeFor(toolName) };
    const handler = this.modes.get(this.mode);
    if (!handler) {
      console.warn(`[permissions] Unknown permission mode "${this.mode}", asking instead`);
      return { behavior: 'ask', reason: 'No rule matched', inferredPattern, remember };
    }
    const behavior = handler({ toolName, input, inferredPattern });
    const decision: PermissionDecision = { behavior, reason: `No rule matched (mode: ${this.mode})`, inferredPattern };
    if (behavior === 'ask') decision.remember = remember;
    return decision;
  }

  /**
   * Store a pattern for future calls: write tools go to the session cache, everything else to the
   * project's durable allow list. Defaults to the pattern inferred from the invocation.
   */
  async remember(toolName: string, input: JsonObject, patternText?: string): Promise<RememberedPattern> {
    const text = patternText ?? inferPattern(toolName, input);
    if (this.scopeFor(toolName) === 'session') {
      const pattern = parsePermissionPattern(text);
      if (!this.sessionCache.some((existing) => existing.raw === pattern.raw)) {
        this.sessionCache = [...this.sessionCache, pattern];
      }
      return { pattern: pattern.raw, scope: 'session' };
    }
    const pattern = await this.rules.addAllow(text);
    return { pattern: pattern.raw, scope: 'project' };
  }

  clearSessionCache(): void {
    this.sessionCache = [];
  }

  private scopeFor(toolName: string): PermissionScope {
    return isWriteTool(toolName) ? 'session' : 'project';
  }

  private isInternalTool(toolName: string): boolean {
    return INTERNAL_TOOLS.has(toolName) || this.internalPrefixes.some((prefix) => toolName.startsWith(prefix));
  }

  private isReadInsideWorkingDir(toolName: string, input: JsonObject): boolean {
    const parsed = parseToolInput(toolName, input);
    let target: string | undefined;
    if (parsed.kind === 'file' && parsed.tool === 'Read') {
      target = parsed.filePath;
    } else if (parsed.kind === 'search') {
      target = parsed.path ?? this.cwd;
    } else {
      return false;
    }
    if (!target || hasPathTraversal(target)) return false;

    const absolute = target.startsWith('/') ? normalizePath(target) : normalizePath(path.posix.join(this.cwd, target));
    return absolute === this.cwd || absolute.startsWith(this.cwd === '/' ? '/' : `${this.cwd}/`);
  }
}
