import { z } from 'zod'

const band = z.object({
  from: z.number(),
  to: z.number().nullable(),
  start: z.number(),
  slope: z.number().nonnegative(),
  floor: z.number(),
})

const tier = z.object({
  from: z.number(),
  to: z.number().nullable(),
  base: z.number(),
  rate: z.number().nonnegative(),
})

const weight = z.number().min(0).max(1)

/** Severity thresholds, most severe first: the first matching threshold wins. */
const severityBands = z.array(z.object({ threshold: z.number(), severity: z.number().min(0).max(1) }))

const baselineSchema = z
  .object({
    windowDays: z.number().int().positive().default(7),
    minSamples: z.number().int().positive().default(3),
    longWindowDays: z.number().int().positive().default(30),
    trendThresholdPct: z.number().nonnegative().default(5),
  })
  .default({})

const trainingLoadSchema = z
  .object({
    ctlDays: z.number().positive().default(42),
    atlDays: z.number().positive().default(7),
    freshTsb: z.number().default(5),
    neutralTsbFloor: z.number().default(-10),
    fatiguedTsbFloor: z.number().default(-30),
  })
  .default({})

const recoverySchema = z
  .object({
    neutralScore: z.number().min(0).max(100).default(50),
    weights: z
      .object({
        hrv: weight.default(0.3),
        rhr: weight.default(0.2),
        sleep: weight.default(0.3),
        respiratory: weight.default(0.1),
        form: weight.default(0.1),
      })
      .default({}),
    // fractional HRV drop below baseline
    hrvDropBands: z.array(band).default([
      { from: 0, to: 0.1, start: 100, slope: 150, floor: 85 },
      { from: 0.1, to: 0.2, start: 85, slope: 250, floor: 60 },
      { from: 0.2, to: 0.35, start: 60, slope: 200, floor: 30 },
      { from: 0.35, to: null, start: 30, slope: 60, floor: 0 },
    ]),
    // fractional RHR rise above baseline
    rhrRiseBands: z.array(band).default([
      { from: 0, to: 0.08, start: 100, slope: 150, floor: 88 },
      { from: 0.08, to: 0.15, start: 88, slope: 300, floor: 67 },
      { from: 0.15, to: 0.25, start: 67, slope: 300, floor: 37 },
      { from: 0.25, to: null, start: 37, slope: 100, floor: 0 },
    ]),
    respiratoryElevatedBands: z.array(band).default([
      { from: 0, to: 0.05, start: 100, slope: 0, floor: 100 },
      { from: 0.05, to: 0.15, start: 100, slope: 500, floor: 50 },
      { from: 0.15, to: null, start: 20, slope: 200, floor: 0 },
    ]),
    respiratorySuppressedBands: z.array(band).default([
      { from: 0, to: 0.05, start: 100, slope: 0, floor: 100 },
      { from: 0.05, to: 0.15, start: 100, slope: 300, floor: 70 },
      { from: 0.15, to: null, start: 70, slope: 200, floor: 40 },
    ]),
    // ATL / CTL ratio
    formRatioBands: z.array(band).default([
      { from: 0, to: 1, start: 100, slope: 0, floor: 100 },
      { from: 1, to: 1.5, start: 100, slope: 100, floor: 50 },
      { from: 1.5, to: null, start: 50, slope: 50, floor: 0 },
    ]),
    tssPenaltyTiers: z.array(tier).default([
      { from: 50, to: 100, base: 0, rate: 0.2 },
      { from: 100, to: 200, base: 10, rate: 0.15 },
      { from: 200, to: null, base: 25, rate: 0.3 },
    ]),
    tssPenaltyCap: z.number().nonnegative().default(40),
    bands: z
      .object({ optimal: z.number().default(80), good: z.number().default(60), fair: z.number().default(40) })
      .default({}),
  })
  .default({})

const confoundersSchema = z
  .object({
    illness: z
      .object({
        respiratoryRisePct: z.number().default(8),
        hrvDropPct: z.number().default(10),
        rhrRisePct: z.number().default(3),
      })
      .default({}),
    alcohol: z
      .object({
        // HRV change in percent (negative = below baseline), most severe first
        hrvTiers: z
          .array(z.object({ below: z.number(), confidence: z.number(), basePenalty: z.number() }))
          .default([
            { below: -35, confidence: 30, basePenalty: 20 },
            { below: -30, confidence: 28, basePenalty: 16 },
            { below: -25, confidence: 25, basePenalty: 12 },
            { below: -20, confidence: 20, basePenalty: 10 },
            { below: -15, confidence: 15, basePenalty: 7 },
            { below: -10, confidence: 10, basePenalty: 4 },
          ]),
        // sleep score below threshold adds confidence
        poorSleep: z
          .object({
            veryPoorBelow: z.number().default(40),
            veryPoorConfidence: z.number().default(20),
            poorBelow: z.number().default(60),
            poorConfidence: z.number().default(10),
            deepSuppressionBelow: z.number().default(50),
            deepSuppressionConfidence: z.number().default(15),
          })
          .default({}),
        // RHR component score below threshold adds confidence and scales the penalty
        rhr: z
          .object({
            strongBelow: z.number().default(30),
            strongConfidence: z.number().default(15),
            strongMultiplier: z.number().positive().default(1.5),
            moderateBelow: z.number().default(50),
            moderateConfidence: z.number().default(10),
            moderateMultiplier: z.number().positive().default(1.25),
          })
          .default({}),
        // fractional respiratory change against baseline
        respiratory: z
          .object({
            stableWithin: z.number().nonnegative().default(0.1),
            stableConfidence: z.number().default(15),
            elevatedAbove: z.number().nonnegative().default(0.15),
            elevatedConfidence: z.number().default(-20),
          })
          .default({}),
        weekend: z
          .object({
            confidence: z.number().default(10),
            amplifyAboveConfidence: z.number().default(60),
            multiplier: z.number().positive().default(1.2),
          })
          .default({}),
        confidenceThreshold: z.number().default(50),
        maxPenalty: z.number().nonnegative().default(15),
        excellentSleepScore: z.number().default(80),
        excellentSleepMitigation: z.number().min(0).max(1).default(0.7),
        goodSleepScore: z.number().default(65),
        goodSleepMitigation: z.number().min(0).max(1).default(0.85),
      })
      .default({}),
  })
  .default({})

const sleepSchema = z
  .object({
    defaultNeedHours: z.number().positive().default(8),
    debtWindowDays: z.number().int().positive().default(7),
    weights: z
      .object({
        performance: weight.default(0.3),
        efficiency: weight.default(0.22),
        stageQuality: weight.default(0.32),
        restfulness: weight.default(0.14),
        timing: weight.default(0.02),
      })
      .default({}),
    stageQuality: z
      .object({ excellentShare: z.number().default(0.4), fairShare: z.number().default(0.3) })
      .default({}),
    // [maxWakeEvents, score], ascending; anything above the last entry scores `restfulnessFloor`
    wakeEventTiers: z
      .array(z.tuple([z.number().int().nonnegative(), z.number()]))
      .default([
        [2, 100],
        [5, 75],
        [8, 50],
      ]),
    restfulnessFloor: z.number().default(25),
    // [maxDeviationMin, score], ascending
    timingTiers: z
      .array(z.tuple([z.number().nonnegative(), z.number()]))
      .default([
        [30, 100],
        [60, 75],
        [90, 50],
      ]),
    timingFloor: z.number().default(25),
    bands: z
      .object({ optimal: z.number().default(80), good: z.number().default(60), fair: z.number().default(40) })
      .default({}),
  })
  .default({})

const strainSchema = z
  .object({
    exponents: z
      .object({ female: z.number().default(1.67), male: z.number().default(1.92), unspecified: z.number().default(1.85) })
      .default({}),
    hrBlendWeight: z.number().min(0).max(1).default(0.6),
    lastSampleSec: z.number().positive().default(1),
    maxSampleGapSec: z.number().positive().default(300),
    epocCoefficient: z.number().positive().default(0.25),
    epocExponent: z.number().positive().default(1.1),
    epocMax: z.number().positive().default(300),
    maxStrain: z.number().positive().default(21),
    recoveryModulation: z.number().min(0).max(1).default(0.15),
    // blend of relative HRV gain, relative RHR drop and centred sleep score
    recoverySignal: z
      .object({
        hrvWeight: z.number().default(0.6),
        rhrWeight: z.number().default(0.3),
        sleepWeight: z.number().default(0.1),
        sleepCenter: z.number().default(75),
        sleepSpread: z.number().positive().default(25),
      })
      .default({}),
    normalizedPowerWindow: z.number().int().positive().default(30),
    // heart-rate-reserve upper bounds for zones 1-4; zone 5 is everything above
    hrReserveZoneBounds: z.tuple([z.number(), z.number(), z.number(), z.number()]).default([0.6, 0.7, 0.8, 0.9]),
    bands: z
      .object({
        light: z.number().default(5),
        moderate: z.number().default(11),
        hard: z.number().default(16),
        veryHard: z.number().default(18),
      })
      .default({}),
  })
  .default({})

const riskSchema = z
  .object({
    weights: z
      .object({
        recovery: weight.default(0.25),
        hrvDeviation: weight.default(0.25),
        rhrElevation: weight.default(0.2),
        tsb: weight.default(0.2),
        sleepDebt: weight.default(0.1),
      })
      .default({}),
    baselineSeverity: z.number().min(0).max(1).default(0.1),
    // average recovery score: below threshold
    recoveryBands: severityBands.default([
      { threshold: 50, severity: 1 },
      { threshold: 60, severity: 0.7 },
      { threshold: 70, severity: 0.4 },
    ]),
    // HRV change in percent: below threshold
    hrvBands: severityBands.default([
      { threshold: -20, severity: 1 },
      { threshold: -15, severity: 0.7 },
      { threshold: -10, severity: 0.4 },
    ]),
    // RHR change in percent: above threshold
    rhrBands: severityBands.default([
      { threshold: 15, severity: 1 },
      { threshold: 10, severity: 0.7 },
      { threshold: 5, severity: 0.4 },
    ]),
    // TSB: below threshold
    tsbBands: severityBands.default([
      { threshold: -30, severity: 1 },
      { threshold: -20, severity: 0.7 },
      { threshold: -10, severity: 0.3 },
    ]),
    // sleep debt hours: above threshold
    sleepDebtBands: severityBands.default([
      { threshold: 10, severity: 1 },
      { threshold: 6, severity: 0.6 },
      { threshold: 3, severity: 0.3 },
    ]),
    levels: z
      .object({ moderate: z.number().default(25), high: z.number().default(50), critical: z.number().default(75) })
      .default({}),
    recoveryAverageDays: z.number().int().positive().default(7),
  })
  .default({})

const phaseSchema = z
  .object({
    baseLowIntensityPct: z.number().default(70),
    baseMinWeeklyTss: z.number().default(300),
    baseConfidenceCap: z.number().default(0.95),
    recoveryMaxWeeklyTss: z.number().default(200),
    recoveryConfidence: z.number().default(0.8),
    peakHighIntensityPct: z.number().default(25),
    peakConfidenceDivisor: z.number().positive().default(40),
    peakConfidenceCap: z.number().default(0.9),
    buildMinHighIntensityPct: z.number().default(15),
    buildMinWeeklyTss: z.number().default(300),
    buildConfidence: z.number().default(0.75),
    transitionConfidence: z.number().default(0.5),
  })
  .default({})

// signals run from -100 to 100; recovery is the raw 0-100 score
const recommendationSchema = z
  .object({
    hrvTrendScale: z.number().positive().default(5),
    formScale: z.number().positive().default(2.5),
    hrvPositiveAbove: z.number().default(5),
    hrvNegativeBelow: z.number().default(-10),
    stableAbove: z.number().default(50),
    steadyAbove: z.number().default(0),
    unstableBelow: z.number().default(-20),
    recoveredAt: z.number().default(70),
    adequateRecoveryAt: z.number().default(60),
    fatiguedBelow: z.number().default(50),
    freshAbove: z.number().default(20),
    overreachedBelow: z.number().default(-20),
    clearSignalAbove: z.number().nonnegative().default(10),
    quick: z
      .object({
        hardAt: z.number().default(80),
        moderateAt: z.number().default(60),
        easyAt: z.number().default(40),
        highTssAbove: z.number().default(150),
      })
      .default({}),
  })
  .default({})

const correlationSchema = z
  .object({
    minSamples: z.number().int().min(3).default(3),
    strong: z.number().default(0.7),
    moderate: z.number().default(0.5),
    weak: z.number().default(0.3),
    trendDeadband: z.number().nonnegative().default(0.1),
  })
  .default({})

export const readinessConfigSchema = z.object({
  baseline: baselineSchema,
  trainingLoad: trainingLoadSchema,
  recovery: recoverySchema,
  confounders: confoundersSchema,
  sleep: sleepSchema,
  strain: strainSchema,
  risk: riskSchema,
  phase: phaseSchema,
  correlation: correlationSchema,
  recommendation: recommendationSchema,
})

export type ReadinessConfig = z.infer<typeof readinessConfigSchema>
export type ReadinessConfigInput = z.input<typeof readinessConfigSchema>
export type SeverityBand = ReadinessConfig['risk']['recoveryBands'][number]
