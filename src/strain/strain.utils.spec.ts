import { defaultReadinessConfig } from '../config/readiness-config'
import { dailyStrainSchema, strainResultSchema } from './strain.schema'
import type { ActivitySample, AthleteProfile } from './strain.types'
import {
  dailyStrain,
  epocFromTrimp,
  normalizedPower,
  powerTrainingLoad,
  recoveryFactor,
  scoreActivity,
  strainBandFor,
  strainFromEpoc,
} from './strain.utils'

const cfg = defaultReadinessConfig().strain
const athlete: AthleteProfile = { restingHr: 60, maxHr: 180, ftp: 250, sex: 'male' }

/** One sample per minute at a steady heart rate. */
const steady = (minutes: number, heartRate: number): ActivitySample[] =>
  Array.from({ length: minutes + 1 }, (_, i) => ({ offsetSec: i * 60, heartRate }))

describe('scoreActivity', () => {
  it('counts a minute at maximal heart rate as one impulse minute', () => {
    const result = scoreActivity(
      [
        { offsetSec: 0, heartRate: 180 },
        { offsetSec: 60, heartRate: 180 },
      ],
      { ...athlete, sex: 'unspecified' },
      cfg,
    )

    // 60 s gap plus 1 s for the last sample
    expect(strainResultSchema.safeParse(result).success).toBe(true)
    expect(result.trimp).toBeCloseTo(61 / 60, 10)
    expect(result.durationMin).toBeCloseTo(61 / 60, 10)
    expect(result.source).toBe('heartRate')
    expect(result.zoneSeconds).toEqual({ z1Sec: 0, z2Sec: 0, z3Sec: 0, z4Sec: 0, z5Sec: 61 })
  })

  it('uses the sex-specific exponent', () => {
    const samples = [{ offsetSec: 0, heartRate: 150 }]
    const female = scoreActivity(samples, { ...athlete, sex: 'female' }, cfg)
    const male = scoreActivity(samples, athlete, cfg)

    expect(female.trimp).toBeCloseTo(Math.pow(0.75, 1.67) / 60, 10)
    expect(male.trimp).toBeCloseTo(Math.pow(0.75, 1.92) / 60, 10)
  })

  it('splits time across heart-rate reserve zones', () => {
    const samples = [120, 138, 150, 162, 175].map((heartRate, i) => ({ offsetSec: i * 10, heartRate }))
    const result = scoreActivity(samples, athlete, cfg)

    expect(result.zoneSeconds).toEqual({ z1Sec: 10, z2Sec: 10, z3Sec: 10, z4Sec: 10, z5Sec: 1 })
  })

  it('blends heart rate and power when both are present', () => {
    const result = scoreActivity([{ offsetSec: 0, heartRate: 120, power: 200 }], athlete, cfg)

    // 0.6 * 0.5 + 0.4 * 0.8
    expect(result.source).toBe('blended')
    expect(result.trimp).toBeCloseTo(Math.pow(0.62, 1.92) / 60, 10)
  })

  it('falls back to power alone', () => {
    const result = scoreActivity([{ offsetSec: 0, power: 250 }], athlete, cfg)
    expect(result.source).toBe('power')
    expect(result.trimp).toBeCloseTo(1 / 60, 10)
  })

  it('scores an activity without usable data as zero', () => {
    const result = scoreActivity([{ offsetSec: 0 }, { offsetSec: 30 }], { ...athlete, ftp: null }, cfg)
    expect(result.source).toBeNull()
    expect(result.trimp).toBe(0)
    expect(result.strain).toBe(0)
    expect(result.band).toBe('Light')
  })

  it('caps the gap between samples', () => {
    const result = scoreActivity(
      [
        { offsetSec: 0, heartRate: 180 },
        { offsetSec: 3600, heartRate: 180 },
      ],
      athlete,
      cfg,
    )
    expect(result.durationMin).toBeCloseTo(301 / 60, 10)
  })

  it('grows with duration and intensity', () => {
    const short = scoreActivity(steady(30, 150), athlete, cfg).strain
    const long = scoreActivity(steady(90, 150), athlete, cfg).strain
    const harder = scoreActivity(steady(90, 170), athlete, cfg).strain

    expect(long).toBeGreaterThan(short)
    expect(harder).toBeGreaterThan(long)
  })

  it('never exceeds 21', () => {
    const result = scoreActivity(steady(24 * 60, 180), athlete, cfg)
    expect(result.strain).toBe(21)
    expect(result.band).toBe('All Out')
  })
})

describe('strain scale', () => {
  it('maps EPOC logarithmically onto 0-21', () => {
    expect(strainFromEpoc(0, cfg)).toBe(0)
    expect(strainFromEpoc(300, cfg)).toBe(21)
    expect(strainFromEpoc(10_000, cfg)).toBe(21)
    expect(epocFromTrimp(100, cfg)).toBeCloseTo(0.25 * Math.pow(100, 1.1), 10)
  })

  it.each([
    [5, 'Light'],
    [5.1, 'Moderate'],
    [11, 'Moderate'],
    [16, 'Hard'],
    [18, 'Very Hard'],
    [18.5, 'All Out'],
  ] as const)('bands %p as %s', (strain, band) => {
    expect(strainBandFor(strain, cfg.bands)).toBe(band)
  })
})

describe('power load', () => {
  const stream = (powers: number[]): ActivitySample[] => powers.map((power, i) => ({ offsetSec: i, power }))

  it('computes TSS from normalized power', () => {
    const load = powerTrainingLoad(stream(Array.from({ length: 60 }, () => 200)), 250, cfg)

    expect(load?.normalizedPower).toBeCloseTo(200, 8)
    expect(load?.intensityFactor).toBeCloseTo(0.8, 8)
    expect(load?.durationSec).toBe(60)
    expect(load?.tss).toBeCloseTo(((60 * 200 * 0.8) / (250 * 3600)) * 100, 8)
  })

  it('weights surges above the average', () => {
    const powers = [...Array.from({ length: 30 }, () => 100), ...Array.from({ length: 30 }, () => 300)]
    const np = normalizedPower(powers, 30)
    expect(np).not.toBeNull()
    expect(np ?? 0).toBeGreaterThan(200)
  })

  it('averages short streams', () => {
    expect(normalizedPower([100, 200], 30)).toBe(150)
    expect(normalizedPower([], 30)).toBeNull()
  })

  it('needs an FTP', () => {
    expect(powerTrainingLoad(stream([200, 200]), null, cfg)).toBeNull()
  })
})

describe('dailyStrain', () => {
  it('sums EPOC across activities before scaling', () => {
    const morning = scoreActivity(steady(45, 150), athlete, cfg)
    const evening = scoreActivity(steady(30, 140), athlete, cfg)

    const day = dailyStrain('2024-01-03', [morning, evening], null, cfg)

    expect(dailyStrainSchema.safeParse(day).success).toBe(true)
    expect(day.activityCount).toBe(2)
    expect(day.epoc).toBeCloseTo(morning.epoc + evening.epoc, 10)
    expect(day.strain).toBeCloseTo(strainFromEpoc(morning.epoc + evening.epoc, cfg), 10)
    expect(day.strain).toBeGreaterThan(Math.max(morning.strain, evening.strain))
  })

  it('modulates by up to 15% from the recovery signal', () => {
    expect(recoveryFactor(null, cfg)).toBe(1)
    // 0.6 * 0.5 + 0.3 * 0.5 + 0.1 * 1
    expect(recoveryFactor({ hrvChange: 0.5, rhrChange: -0.5, sleepScore: 100 }, cfg)).toBeCloseTo(1.0825, 10)
    expect(recoveryFactor({ hrvChange: 5 }, cfg)).toBeCloseTo(1.15, 10)
    expect(recoveryFactor({ hrvChange: -5 }, cfg)).toBeCloseTo(0.85, 10)
  })

  it('is zero for a rest day', () => {
    const day = dailyStrain('2024-01-03', [], { hrvChange: 0.2 }, cfg)
    expect(day.strain).toBe(0)
    expect(day.band).toBe('Light')
  })
})
