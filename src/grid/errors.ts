/**
 * Grid Error Types
 *
 * Custom errors for graph construction, placement queries and the energy solve.
 */

/**
 * Thrown when a link would join a node to itself
 */
export class DegenerateLinkError extends Error {
  constructor(public readonly nodeId: string) {
    super(`Link from '${nodeId}' to itself is not permitted`);
    this.name = 'DegenerateLinkError';
  }
}

/**
 * Thrown when grid data carries a value the placement cannot use
 */
export class InvalidGridDataError extends Error {
  constructor(
    public readonly entry: string,
    public readonly reason: string
  ) {
    super(`Invalid grid data ${entry}: ${reason}`);
    this.name = 'InvalidGridDataError';
  }
}

/**
 * Thrown when a node id is not part of the resolved graph
 */
export class UnknownNodeError extends Error {
  constructor(
    public readonly nodeId: string,
    public readonly context: string
  ) {
    super(`Node '${nodeId}' not found (${context})`);
    this.name = 'UnknownNodeError';
  }
}

/**
 * Thrown when a node is asked for its position before one has been assigned
 */
export class UnresolvedPositionError extends Error {
  constructor(public readonly nodeId: string) {
    super(`Node '${nodeId}' has no position; assign minimum positions first`);
    this.name = 'UnresolvedPositionError';
  }
}

/**
 * Thrown when spans are requested before any placement pass has run
 */
export class PlacementNotComputedError extends Error {
  constructor(public readonly operation: string) {
    super(`${operation} requires positions; call getDesiredGeometry() or calculatePositions() first`);
    this.name = 'PlacementNotComputedError';
  }
}

/**
 * Thrown when the constraint graph contains a cycle
 */
export class CycleError extends Error {
  constructor(public readonly unresolved: string[]) {
    super(`Constraint graph has a cycle through nodes: ${unresolved.join(', ')}`);
    this.name = 'CycleError';
  }
}

/**
 * Thrown when the energy equations cannot be solved
 */
export class SingularMatrixError extends Error {
  constructor(public readonly reason: string) {
    super(`Equation set is not solvable: ${reason}`);
    this.name = 'SingularMatrixError';
  }
}

/**
 * Thrown when cell data text is malformed
 */
export class CellDataParseError extends Error {
  constructor(
    public readonly token: string,
    public readonly reason: string
  ) {
    super(`Bad cell data '${token}': ${reason}`);
    this.name = 'CellDataParseError';
  }
}
