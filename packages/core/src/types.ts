export type Measured<T> = { kind: 'present'; value: T } | { kind: 'absent' };

export type SignalCategory = 'topology' | 'exploitProbability' | 'exploited' | 'severity';
export type PriorityTier = 'critical' | 'high' | 'medium' | 'low';
export type MissingSignal = 'exploitProbability' | 'severity';

export const SIGNAL_CATEGORIES: readonly SignalCategory[] = ['topology', 'exploitProbability', 'exploited', 'severity'];

export interface Component {
  /** Package URL, unique within one inventory. */
  id: string;
  name: string;
  version: string;
  ecosystem: string;
}

export interface DependencyEdge {
  parent: string;
  child: string;
}

export interface Vulnerability {
  id: string;
  /** Base score on the CVSS scale. */
  severity: Measured<number>;
  componentIds: string[];
}

export interface ThreatSignal {
  vulnerabilityId: string;
  exploitProbability: Measured<number>;
  exploited: boolean;
}

export interface Inventory {
  components: Component[];
  dependencies: DependencyEdge[];
  /** Direct dependencies of the analyzed artifact. Empty means "every component without a parent". */
  roots: string[];
  vulnerabilities: Vulnerability[];
  threatSignals: ThreatSignal[];
}

export interface TopologyPolicy {
  depthWeight: number;
  centralityWeight: number;
  /** TCS above which a component counts as a hub in the run summary. */
  hubThreshold: number;
}

export interface EntropyPolicy {
  bins: number;
}

export interface RankingPolicy {
  /** Exploited records precede every non-exploited record, whatever their composite. */
  exploitedOverride: boolean;
}

export interface PrioritizeOptions {
  topology: TopologyPolicy;
  entropy: EntropyPolicy;
  ranking: RankingPolicy;
  severityScale: number;
}

export interface PrioritizeOverrides {
  topology?: Partial<TopologyPolicy>;
  entropy?: Partial<EntropyPolicy>;
  ranking?: Partial<RankingPolicy>;
  severityScale?: number;
}

export interface TopologyScore {
  componentId: string;
  depth: number;
  normalizedDepth: number;
  centrality: number;
  dependents: number;
  reachable: boolean;
  tcs: number;
}

export interface ComponentSignals {
  componentId: string;
  exploitProbability: number;
  exploited: boolean;
  /** Highest present severity of the component's vulnerabilities, normalized to [0,1]. */
  severity: number;
  vulnerabilityIds: string[];
  incomplete: boolean;
}

export type WeightSet = Record<SignalCategory, number>;

export interface CategoryEntropy {
  category: SignalCategory;
  bins: number;
  entropy: number;
  normalizedEntropy: number;
}

export interface ScoreRecord {
  rank: number;
  componentId: string;
  vulnerabilityId: string;
  composite: number;
  priority: PriorityTier;
  tcs: number;
  exploitProbability: number;
  exploited: boolean;
  severity: number;
  rawSeverity: number | null;
}

export interface IncompleteSignalWarning {
  kind: 'incomplete-signal';
  vulnerabilityId: string;
  componentIds: string[];
  missing: MissingSignal[];
}

export type DegenerateReason = 'no-vulnerabilities' | 'single-component' | 'uniform-signals';

export interface DegenerateInputNotice {
  kind: 'degenerate-input';
  reason: DegenerateReason;
  message: string;
}

export interface PrioritizationSummary {
  componentCount: number;
  vulnerabilityCount: number;
  recordCount: number;
  byPriority: Record<PriorityTier, number>;
  hubComponents: number;
  maxDepth: number;
  incompleteCount: number;
}

export interface PrioritizationResult {
  records: ScoreRecord[];
  weights: WeightSet | null;
  entropy: CategoryEntropy[];
  topology: TopologyScore[];
  componentSignals: ComponentSignals[];
  warnings: IncompleteSignalWarning[];
  notices: DegenerateInputNotice[];
  summary: PrioritizationSummary;
}

export interface ThreatLookupResult {
  exploitProbability?: number | null;
  exploited?: boolean;
}

export type SignalFailureReason = 'timeout' | 'lookup_failed' | 'not_found';

export interface SignalFailure {
  vulnerabilityId: string;
  reason: SignalFailureReason;
  message?: string;
}

export interface SignalCollection {
  signals: ThreatSignal[];
  failures: SignalFailure[];
}
