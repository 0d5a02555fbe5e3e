/**
 * @tunnelbot/security — operator authorization.
 */

export { OperatorGate } from './operator-gate.js';
export type { OperatorGateConfig } from './operator-gate.js';
