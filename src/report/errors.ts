/**
 * Every inconsistency found by a single `Topology.validate` call.
 */
export class TopologyValidationError extends Error {
  public readonly violations: string[];

  constructor(violations: string[]) {
    super(`${violations.length} error(s): ${violations.join('; ')}`);
    this.name = 'TopologyValidationError';
    this.violations = violations;
  }
}
