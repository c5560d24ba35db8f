import { defaultReadinessConfig } from '../config/readiness-config'
import { intensityDistribution } from '../types/zones.utils'
import { classifyPhase, detectPhase } from './training-phase.rules'
import { phaseResultSchema } from './training-phase.schema'

const cfg = defaultReadinessConfig().phase

describe('classifyPhase', () => {
  it('detects a base block from mostly easy volume', () => {
    const result = classifyPhase(400, 80, 5, cfg)
    expect(result.phase).toBe('Base')
    expect(result.confidence).toBe(0.8)
  })

  it('caps base confidence', () => {
    expect(classifyPhase(400, 99, 0, cfg).confidence).toBe(0.95)
  })

  it('detects recovery from low stress before looking at intensity', () => {
    expect(classifyPhase(150, 40, 40, cfg)).toEqual({ phase: 'Recovery', confidence: 0.8 })
  })

  it('detects a peak from a large high-intensity share', () => {
    expect(classifyPhase(350, 50, 30, cfg)).toEqual({ phase: 'Peak', confidence: 0.75 })
    expect(classifyPhase(350, 40, 60, cfg).confidence).toBe(0.9)
  })

  it('detects a build block', () => {
    expect(classifyPhase(300, 60, 15, cfg)).toEqual({ phase: 'Build', confidence: 0.75 })
    expect(classifyPhase(320, 60, 25, cfg).phase).toBe('Build')
  })

  it('falls through to transition', () => {
    expect(classifyPhase(250, 60, 10, cfg)).toEqual({ phase: 'Transition', confidence: 0.5 })
    // not enough volume for a build
    expect(classifyPhase(250, 60, 20, cfg).phase).toBe('Transition')
  })

  it('gives base precedence over the other rules', () => {
    expect(classifyPhase(301, 71, 29, cfg).phase).toBe('Base')
    expect(classifyPhase(300, 71, 29, cfg).phase).toBe('Peak')
  })
})

describe('detectPhase', () => {
  it('derives intensity shares from zone time', () => {
    const distribution = intensityDistribution({ z1Sec: 3600, z2Sec: 3600, z3Sec: 900, z4Sec: 600, z5Sec: 300 })

    const result = detectPhase(420, distribution, cfg)

    // low 7200 / 9000, high 900 / 9000
    expect(phaseResultSchema.safeParse(result).success).toBe(true)
    expect(result.lowIntensityPercent).toBeCloseTo(80, 10)
    expect(result.highIntensityPercent).toBeCloseTo(10, 10)
    expect(result.phase).toBe('Base')
    expect(result.recommendation.length).toBeGreaterThan(0)
  })

  it('treats an empty week as zero intensity', () => {
    const distribution = intensityDistribution({ z1Sec: 0, z2Sec: 0, z3Sec: 0, z4Sec: 0, z5Sec: 0 })
    expect(distribution).toEqual({ lowIntensityPercent: 0, highIntensityPercent: 0, totalSec: 0 })
    expect(detectPhase(0, distribution, cfg).phase).toBe('Recovery')
  })
})
