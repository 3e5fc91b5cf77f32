import { describe, expect, it } from 'vitest'
import { createActuatorPolicy, createAlertPolicy, createLogPolicy } from '@facegate/actuation'

describe('createActuatorPolicy', () => {
  it('should start off and fire only on transitions', () => {
    const policy = createActuatorPolicy()

    expect(policy.isOn()).toBe(false)
    expect(policy.decide(false)).toBe(false)
    expect(policy.decide(true)).toBe(true)
    expect(policy.decide(true)).toBe(false)
    expect(policy.decide(false)).toBe(true)
    expect(policy.isOn()).toBe(false)
  })

  it('should send exactly once per transition over a presence sequence', () => {
    const policy = createActuatorPolicy()
    const presence = [false, true, true, true, false, false, true, false, false]

    const sends = presence.filter((present) => policy.decide(present))

    expect(sends).toEqual([true, false, true, false])
  })
})

describe('createAlertPolicy', () => {
  it('should allow the first dispatch and then wait out the cooldown', () => {
    const policy = createAlertPolicy(15_000)

    expect(policy.getLastDispatch()).toBeNull()
    expect(policy.tryAcquire(0)).toBe(true)
    expect(policy.tryAcquire(15_000)).toBe(false)
    expect(policy.tryAcquire(15_001)).toBe(true)
    expect(policy.getLastDispatch()).toBe(15_001)
  })

  it('should bound dispatches to 1 + floor(window / cooldown)', () => {
    const cooldownMs = 1000
    const windowMs = 10_000
    const policy = createAlertPolicy(cooldownMs)

    let dispatched = 0
    for (let now = 0; now <= windowMs; now += 7) {
      if (policy.tryAcquire(now)) dispatched += 1
    }

    expect(dispatched).toBeLessThanOrEqual(1 + Math.floor(windowMs / cooldownMs))
    expect(dispatched).toBeGreaterThan(0)
  })
})

describe('createLogPolicy', () => {
  it('should log a new identity at once', () => {
    const policy = createLogPolicy(3000)

    expect(policy.decide(['Amy'], 0)).toEqual([true])
    expect(policy.decide(['Bob'], 1)).toEqual([true])
    expect(policy.getState()).toEqual({ lastIdentities: ['Bob'], lastLoggedAt: 1 })
  })

  it('should suppress the same identity until the cooldown elapses', () => {
    const policy = createLogPolicy(3000)

    expect(policy.decide(['Amy'], 0)).toEqual([true])
    expect(policy.decide(['Amy'], 2999)).toEqual([false])
    expect(policy.decide(['Amy'], 3000)).toEqual([true])
  })

  it('should not treat two identities in one set as a change on replay', () => {
    const policy = createLogPolicy(3000)

    expect(policy.decide(['Amy', 'Unknown'], 0)).toEqual([true, true])
    expect(policy.decide(['Amy', 'Unknown'], 100)).toEqual([false, false])
    expect(policy.decide(['Unknown', 'Amy'], 200)).toEqual([false, false])
    expect(policy.decide(['Amy', 'Unknown'], 3000)).toEqual([true, true])
  })

  it('should log an identity that joins an ongoing set', () => {
    const policy = createLogPolicy(3000)

    expect(policy.decide(['Amy'], 0)).toEqual([true])
    expect(policy.decide(['Amy', 'Bob'], 500)).toEqual([false, true])
    expect(policy.getState()).toEqual({ lastIdentities: ['Amy', 'Bob'], lastLoggedAt: 500 })
  })

  it('should log a duplicated identity once per set', () => {
    const policy = createLogPolicy(3000)

    expect(policy.decide(['Unknown', 'Unknown'], 0)).toEqual([true, false])
  })

  it('should keep its state across sets without faces', () => {
    const policy = createLogPolicy(3000)

    expect(policy.decide(['Amy'], 0)).toEqual([true])
    expect(policy.decide([], 100)).toEqual([])
    expect(policy.decide(['Amy'], 200)).toEqual([false])
  })
})
