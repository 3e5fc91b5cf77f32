/**
 * Gate System Configuration
 *
 * Braided systems for the two modes. Resources start in dependency order
 * and halt in reverse.
 *
 * Dependency Graph (watch):
 *
 *   logger
 *     ├─ shutdown
 *     ├─ frameSource            (ffmpeg, opened at start)
 *     ├─ display  ← shutdown    (ffplay or headless)
 *     │
 *   handoff, cache, inference   (no deps)
 *     │
 *   worker    ← logger, handoff, cache, inference
 *   actuation ← logger, cache, inference
 *   loop      ← logger, frameSource, handoff, cache, display, inference, shutdown
 *     ├─ overlay    ← loop
 *     └─ shortcuts  ← logger, loop, shutdown
 *
 * Enroll mode swaps actuation and the watch overlay for enrollment, and
 * runs the worker detect-only.
 */

import type { StartedSystem } from 'braided'
import type { GateConfig } from '../config'
import { createActuationResource } from './resources/actuation'
import { createDisplayResource } from './resources/display'
import { createEnrollmentResource } from './resources/enrollment'
import type { EnrollmentOptions } from './resources/enrollment'
import { createFrameSourceResource } from './resources/frameSource'
import { createInferenceResource, createWorkerResource } from './resources/inference'
import { createLoggerResource } from './resources/logger'
import { createLoopResource } from './resources/loop'
import { watchOverlayResource } from './resources/overlay'
import { createCacheResource, handoffResource } from './resources/pipeline'
import { shortcutsResource } from './resources/shortcuts'
import { shutdownResource } from './resources/shutdown'

const createCoreResources = (config: GateConfig, recognize: boolean, title: string) => ({
  logger: createLoggerResource(config.logLevel),
  shutdown: shutdownResource,
  frameSource: createFrameSourceResource(config.source),
  handoff: handoffResource,
  cache: createCacheResource(config.rejectStale),
  inference: createInferenceResource(config.inference),
  worker: createWorkerResource(
    { ...config.inference, detectSize: config.source.frameSize },
    recognize,
  ),
  display: createDisplayResource(config, title),
  loop: createLoopResource(config.source),
  shortcuts: shortcutsResource,
})

export const createGateSystemConfig = (config: GateConfig) => ({
  ...createCoreResources(config, true, 'Face Gate'),
  actuation: createActuationResource(config),
  overlay: watchOverlayResource,
})

export const createEnrollSystemConfig = (
  config: GateConfig,
  enrollment: Omit<EnrollmentOptions, 'imagesDir'>,
) => ({
  ...createCoreResources(config, false, 'Registration'),
  enrollment: createEnrollmentResource({ ...enrollment, imagesDir: config.audit.imagesDir }),
})

export type GateSystem = StartedSystem<ReturnType<typeof createGateSystemConfig>>
export type EnrollSystem = StartedSystem<ReturnType<typeof createEnrollSystemConfig>>
