import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  COMPILE: 'compileMs',
  EVALUATE: 'evaluateMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;

export interface MetricsSnapshot {
  compileMs: number;
  evaluateMs: number;
  nodesEvaluated: number;
  functionCalls: number;
  repeatItems: number;
  condOmitted: number;
  functionUsage?: Record<string, number>;
}

type MetricsPhaseKey = (typeof METRIC_PHASES)[MetricPhase];

interface IdleTimerState {
  total: number;
  startedAt?: undefined;
}

interface ActiveTimerState {
  total: number;
  startedAt: number;
}

type TimerState = IdleTimerState | ActiveTimerState;

const DEFAULT_COUNTERS: MetricsSnapshot = {
  compileMs: 0,
  evaluateMs: 0,
  nodesEvaluated: 0,
  functionCalls: 0,
  repeatItems: 0,
  condOmitted: 0,
};

export interface MetricsCollectorOptions {
  now?: () => number;
  enabled?: boolean;
}

export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private readonly timers: Record<MetricsPhaseKey, TimerState>;
  private readonly snapshot: MetricsSnapshot;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.snapshot = { ...DEFAULT_COUNTERS };
    this.timers = {
      compileMs: { total: 0 },
      evaluateMs: { total: 0 },
    };
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public begin(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} already started`);
    }

    this.timers[key] = { total: current.total, startedAt: this.now() };
  }

  public end(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (!isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} was not started`);
    }

    const duration = Math.max(0, this.now() - current.startedAt);
    const total = current.total + duration;
    this.snapshot[key] = total;
    this.timers[key] = { total };
  }

  /** Run `fn` inside begin/end, closing the timer even when it throws. */
  public time<T>(phase: MetricPhase, fn: () => T): T {
    this.begin(phase);
    try {
      return fn();
    } finally {
      this.end(phase);
    }
  }

  public addNodeEvaluated(): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.nodesEvaluated += 1;
  }

  public addFunctionCall(name: string): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.functionCalls += 1;
    const usage = (this.snapshot.functionUsage ??= {});
    usage[name] = (usage[name] ?? 0) + 1;
  }

  public addRepeatItems(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.repeatItems += count;
  }

  public addCondOmitted(): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.condOmitted += 1;
  }

  public snapshotMetrics(): MetricsSnapshot {
    const copy: MetricsSnapshot = { ...this.snapshot };
    if (this.snapshot.functionUsage) {
      copy.functionUsage = { ...this.snapshot.functionUsage };
    }
    return copy;
  }
}

function isActiveTimerState(state: TimerState): state is ActiveTimerState {
  return typeof state.startedAt === 'number';
}
