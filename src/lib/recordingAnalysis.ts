/**
 * Offline analysis of a complete mono recording.
 *
 * Splits the signal into consecutive capture-sized blocks (4096 frames by
 * default, ≈ 93ms at 44.1 kHz), stamps each with offset / sampleRate and
 * replays them through a fresh orchestrator session.
 */

import type { AmbientSnapshot } from "@/types/impact";
import {
  AnalysisOrchestrator,
  createSession,
  type ClassifiedEvent,
  type OrchestratorOptions,
  type OrchestratorStatus,
} from "@/lib/AnalysisOrchestrator";
import { createPcmBuffer, type PcmBuffer } from "@/lib/dsp/types";
import { startTimer } from "@/lib/perfTimer";

export const DEFAULT_BLOCK_SIZE = 4096;

export interface RecordingAnalysisResult {
  events: ClassifiedEvent[];
  ambient: AmbientSnapshot;
  status: OrchestratorStatus;
  durationSeconds: number;
}

export function* splitIntoBuffers(
  samples: Float32Array,
  sampleRate: number,
  blockSize = DEFAULT_BLOCK_SIZE
): Generator<PcmBuffer> {
  const size = Math.max(1, Math.floor(blockSize));
  for (let offset = 0; offset < samples.length; offset += size) {
    const block = samples.subarray(offset, Math.min(offset + size, samples.length));
    yield createPcmBuffer(block, sampleRate, offset / sampleRate);
  }
}

export async function analyzeRecording(
  samples: Float32Array,
  sampleRate: number,
  options: OrchestratorOptions & { blockSize?: number; label?: string; signal?: AbortSignal } = {}
): Promise<RecordingAnalysisResult> {
  const { blockSize, label, signal, ...orchestratorOptions } = options;
  const orchestrator = new AnalysisOrchestrator(orchestratorOptions);
  const events: ClassifiedEvent[] = [];
  const unsubscribe = orchestrator.subscribe((event) => events.push(event));
  const stopTimer = startTimer("analyzeRecording");

  orchestrator.start(createSession(label));
  try {
    for (const buffer of splitIntoBuffers(samples, sampleRate, blockSize)) {
      signal?.throwIfAborted();
      orchestrator.processBuffer(buffer);
    }
    await orchestrator.drain();
    return {
      events,
      ambient: orchestrator.context.getAmbient(),
      status: orchestrator.getStatus(),
      durationSeconds: sampleRate > 0 ? samples.length / sampleRate : 0,
    };
  } finally {
    orchestrator.stop();
    unsubscribe();
    stopTimer();
  }
}
