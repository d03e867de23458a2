/**
 * Policy Constants
 *
 * The tunable numbers behind carry-forward, context-switch detection and
 * summarizer context trimming. A profile can override any subset via
 * profile.json settings; missing overrides fall back to defaults.
 */

export interface PolicyConfig {
  /** How many prior days carry-forward searches for an in-progress ticket. */
  lookbackDays?: number;
  /** A day counts as context switching when repos + projects exceed this. */
  contextSwitchThreshold?: number;
  /** Max characters of an issue description handed to the summarizer. */
  summarizerContextLimit?: number;
  /** Characters of each context embedded in a summarizer fallback remark. */
  fallbackSnippetLength?: number;
}

export type ResolvedPolicy = Required<PolicyConfig>;

export const DEFAULT_POLICY: ResolvedPolicy = {
  lookbackDays: 5,
  contextSwitchThreshold: 2,
  summarizerContextLimit: 500,
  fallbackSnippetLength: 50,
};

/**
 * Merge overrides onto defaults.
 * Returns a fully-resolved policy with no optional fields.
 */
export function resolvePolicy(overrides?: PolicyConfig): ResolvedPolicy {
  if (!overrides) return { ...DEFAULT_POLICY };
  return {
    lookbackDays: overrides.lookbackDays ?? DEFAULT_POLICY.lookbackDays,
    contextSwitchThreshold:
      overrides.contextSwitchThreshold ?? DEFAULT_POLICY.contextSwitchThreshold,
    summarizerContextLimit:
      overrides.summarizerContextLimit ?? DEFAULT_POLICY.summarizerContextLimit,
    fallbackSnippetLength: overrides.fallbackSnippetLength ?? DEFAULT_POLICY.fallbackSnippetLength,
  };
}
