/**
 * @runelock/puzzle - Justified propagation and search
 *
 * Components:
 * - FactDb: per-cell facts with justifications, consolidated to a fixpoint
 * - Views: row/column access to the fact grid
 * - AssumptionTree: arena of search states
 * - FactualSolver: assumption-driven search over a lock
 * - Explainer: justification chains as indented text
 */

export {
  CANNOT_BE,
  MUST_BE,
  assumption,
  contradiction,
  describeFact,
  describeFacts,
  formatHandle,
  isContradiction,
  type ContradictionCause,
  type Fact,
  type FactHandle,
  type FactKind,
  type FactReason,
} from './fact.js';

export { ActivationView, PositionView, VIEWS, type Cell, type View } from './view.js';

export {
  FactDb,
  type ConsolidationResult,
  type FactCounts,
  type FactSnapshot,
  type Given,
} from './fact-db.js';

export { AssumptionTree, ROOT, type NodeHandle, type TreeEntry } from './assumption-tree.js';

export { explainFact, formatExplanation, type ExplanationLine } from './explainer.js';

export {
  FactualSolver,
  describeAction,
  describeSolverError,
  describeStatus,
  type AssumeOutcome,
  type NodeStatus,
  type SolverAction,
  type SolverConfig,
  type SolverError,
  type SolverLogger,
  type SolverNode,
  type SolverPeek,
} from './factual-solver.js';
