/**
 * OperatorGate -- static allow-list of operator identities
 *
 * Only operators listed at startup may drive the bot. Identities are
 * Telegram usernames, which are case-insensitive and often written with a
 * leading "@", so both sides are normalized before comparison.
 */

export interface OperatorGateConfig {
  /** Operator identities allowed to use the bot. */
  operators: readonly string[];
}

export class OperatorGate {
  private readonly operators: ReadonlySet<string>;

  constructor(config: OperatorGateConfig) {
    const normalized = new Set<string>();
    for (const operator of config.operators) {
      const id = this.normalize(operator);
      if (id) normalized.add(id);
    }
    this.operators = normalized;
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /**
   * True when the identity is on the allow-list. Absent or empty identities
   * are never authorized.
   */
  authorize(operatorId: string | undefined): boolean {
    if (operatorId === undefined) return false;
    const id = this.normalize(operatorId);
    if (!id) return false;
    return this.operators.has(id);
  }

  // -----------------------------------------------------------------------
  // Private helpers
  // -----------------------------------------------------------------------

  private normalize(operatorId: string): string {
    return operatorId.trim().replace(/^@/, '').toLowerCase();
  }
}
