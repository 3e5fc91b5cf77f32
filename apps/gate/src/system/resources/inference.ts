/**
 * Inference Resources
 *
 * `inference` bundles the remote client with the sharp codec;
 * `worker` runs the inference loop on top of them.
 */

import { defineResource } from 'braided'
import { componentLogger } from '@facegate/system'
import type { FrameHandoff, Logger } from '@facegate/system'
import { createInferenceClient, createInferenceWorker, createSharpCodec } from '@facegate/recognition'
import type {
  FrameCodec,
  Frame,
  InferenceClient,
  InferenceWorker,
  ResultCache,
} from '@facegate/recognition'
import type { GateConfig } from '../../config'

export type InferenceResource = {
  client: InferenceClient
  codec: FrameCodec
}

export const createInferenceResource = (config: GateConfig['inference']) =>
  defineResource({
    dependencies: [],
    start: (): InferenceResource => ({
      client: createInferenceClient({
        baseUrl: config.baseUrl,
        detectTimeoutMs: config.detectTimeoutMs,
        recognizeTimeoutMs: config.recognizeTimeoutMs,
        registerTimeoutMs: config.registerTimeoutMs,
      }),
      codec: createSharpCodec(),
    }),
  })

type WorkerDependencies = {
  logger: Logger
  handoff: FrameHandoff<Frame>
  cache: ResultCache
  inference: InferenceResource
}

export const createWorkerResource = (
  config: GateConfig['inference'] & { detectSize: number },
  recognize: boolean,
) =>
  defineResource({
    dependencies: ['logger', 'handoff', 'cache', 'inference'],
    start: ({ logger, handoff, cache, inference }: WorkerDependencies) => {
      const worker = createInferenceWorker({
        handoff,
        cache,
        client: inference.client,
        codec: inference.codec,
        logger: componentLogger(logger, 'InferenceWorker'),
        detectSize: config.detectSize,
        padding: config.padding,
        minCropWidth: config.minCropWidth,
        minConfidence: config.minConfidence,
        pollIntervalMs: config.pollIntervalMs,
        recognize,
      })
      worker.start()
      return worker
    },
    halt: async (worker: InferenceWorker) => {
      await worker.stop()
    },
  })
