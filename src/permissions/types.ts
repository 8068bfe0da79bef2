export type PermissionBehavior = 'allow' | 'deny' | 'ask';

/** Where a remembered pattern is stored. */
export type PermissionScope = 'session' | 'project';

export interface PermissionDecision {
  behavior: PermissionBehavior;
  reason: string;
  /** Pattern to store when the decision should be remembered. */
  remember?: { pattern: string; scope: PermissionScope };
  /** Raw text of the allow/deny pattern that decided, if any. */
  matchedPattern?: string;
  /** Pattern that would cover this invocation, offered when asking. */
  inferredPattern?: string;
}

export interface MatchContext {
  /** Working directory used to resolve relative paths and `cd` targets. */
  cwd?: string;
}
