import type {
  ClassificationLevel,
  ResearchContext,
  SectorComparison,
  SectorStatus,
} from "../shared/types/analysis.types";
import type { BenchmarkData, ResearchFindings, SectorBenchmark } from "../shared/types/reference.types";
import { round1 } from "../shared/utils/score.util";

export type SectorCompareResult =
  | {
      ok: true;
      comparison: SectorComparison;
    }
  | {
      ok: false;
      error_code: "unknown_sector";
    };

export interface SectorSummary {
  sector: string;
  description: string;
  sampleSize: number;
}

export class SectorBenchmarkService {
  constructor(private readonly benchmarks: Pick<BenchmarkData, "sectors" | "research">) {}

  listSectors(): SectorSummary[] {
    return this.benchmarks.sectors.map((item) => ({
      sector: item.sector,
      description: item.description,
      sampleSize: item.sampleSize,
    }));
  }

  findSector(name: string): SectorBenchmark | null {
    const exact = this.benchmarks.sectors.find((item) => item.sector === name);
    if (exact) {
      return exact;
    }
    const key = name.trim().toLowerCase();
    return this.benchmarks.sectors.find((item) => item.sector.toLowerCase() === key) ?? null;
  }

  compare(intensity: number, sector: string): SectorCompareResult {
    const benchmark = this.findSector(sector);
    if (!benchmark) {
      return { ok: false, error_code: "unknown_sector" };
    }
    const status = classifyAgainstBenchmark(intensity, benchmark);
    return {
      ok: true,
      comparison: {
        sector: benchmark.sector,
        description: benchmark.description,
        sampleSize: benchmark.sampleSize,
        meanScore: benchmark.meanScore,
        neutralThreshold: benchmark.neutralThreshold,
        bestPractice: benchmark.bestPractice,
        percentile: percentileOf(intensity, benchmark.meanScore, benchmark.distribution.stdDev),
        status: status.status,
        statusLevel: status.level,
      },
    };
  }

  researchContext(intensity: number): ResearchContext {
    const research = this.benchmarks.research;
    return {
      intensity,
      researchAverage: research.researchAverage,
      neutralThreshold: research.neutralThreshold,
      bestPractice: research.bestPractice,
      insight: researchInsight(intensity, research),
    };
  }
}

export function percentileOf(value: number, mean: number, stdDev: number): number {
  if (stdDev <= 0) {
    return value < mean ? 0 : value > mean ? 100 : 50;
  }
  return round1(normalCdf((value - mean) / stdDev) * 100);
}

export function normalCdf(z: number): number {
  return 0.5 * (1 + erf(z / Math.SQRT2));
}

// Abramowitz and Stegun 7.1.26, absolute error below 1.5e-7.
function erf(x: number): number {
  const sign = x < 0 ? -1 : 1;
  const abs = Math.abs(x);
  const t = 1 / (1 + 0.3275911 * abs);
  const poly =
    ((((1.061405429 * t - 1.453152027) * t + 1.421413741) * t - 0.284496736) * t + 0.254829592) *
    t;
  return sign * (1 - poly * Math.exp(-abs * abs));
}

export function classifyAgainstBenchmark(
  intensity: number,
  benchmark: Pick<SectorBenchmark, "bestPractice" | "neutralThreshold" | "meanScore">,
): { status: SectorStatus; level: ClassificationLevel } {
  if (intensity <= benchmark.bestPractice) {
    return { status: "Excellent", level: "excellent" };
  }
  if (intensity <= benchmark.neutralThreshold) {
    return { status: "Good", level: "excellent" };
  }
  if (intensity <= benchmark.meanScore) {
    return { status: "Industry Average", level: "warning" };
  }
  if (intensity <= benchmark.meanScore * 1.5) {
    return { status: "Above Average Bias", level: "warning" };
  }
  return { status: "High Bias", level: "error" };
}

function researchInsight(intensity: number, research: ResearchFindings): string {
  if (intensity <= research.bestPractice) {
    return "Within research best practice for inclusive job advertisements.";
  }
  if (intensity <= research.neutralThreshold) {
    return "Below the research threshold for gender-neutral language.";
  }
  if (intensity <= research.researchAverage) {
    return "Above the neutral threshold but below the research average for comparable adverts.";
  }
  return "Above the research average for comparable adverts; rewording is recommended.";
}
