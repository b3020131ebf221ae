import { assertValidCapabilityName } from '../discovery/packageNames.js';
import type { GapContext, GapSeverity, IGapSource, VarietyGap } from './types.js';

export interface DeclaredRequirementsGapSourceOptions {
  requiredCapabilities: readonly string[];
  /** Ratio of mapped/required at or above which nothing is reported. @default 0.85 */
  varietyThreshold?: number;
}

/**
 * Reports the declared required set minus what is currently mapped, once the
 * share of mapped requirements drops below the variety threshold.
 */
export class DeclaredRequirementsGapSource implements IGapSource {
  readonly name = 'declared-requirements';

  private readonly required: string[];
  private readonly threshold: number;

  constructor(options: DeclaredRequirementsGapSourceOptions) {
    this.required = [...new Set(options.requiredCapabilities.map((c) => assertValidCapabilityName(c)))];
    this.threshold = options.varietyThreshold ?? 0.85;
  }

  /** Share of required capabilities that are mapped; 1 when nothing is required. */
  varietyRatio(mapped: readonly string[]): number {
    if (this.required.length === 0) return 1;
    const have = new Set(mapped);
    return this.required.filter((c) => have.has(c)).length / this.required.length;
  }

  observe(context: GapContext): VarietyGap[] {
    const ratio = this.varietyRatio(context.mappedCapabilities);
    if (ratio >= this.threshold) return [];

    const have = new Set(context.mappedCapabilities);
    const missing = this.required.filter((c) => !have.has(c));
    const severity: GapSeverity = ratio < 0.5 ? 'high' : 'normal';
    return [
      {
        requiredCapabilities: missing,
        severity,
        source: this.name,
        observedAt: new Date().toISOString(),
      },
    ];
  }
}
