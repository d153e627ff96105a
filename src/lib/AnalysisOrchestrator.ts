/**
 * AnalysisOrchestrator: runs one session's buffers through the impact pipeline.
 *
 * processBuffer() does the cheap work inline (level, ambient tracking,
 * candidate gate) and hands candidates to a single-consumer queue for the FFT
 * and classification, so results come out in buffer order against the
 * confirmed-event history they depend on.
 *
 * stop() discards queued and in-flight work: once it returns, nothing more is
 * emitted for that session.
 */

import { randomUUID } from "node:crypto";
import type {
  AmbientSnapshot,
  AnalysisSession,
  AnalysisStatus,
  Classification,
  SensitivityConfig,
  SessionAnalysisState,
} from "@/types/impact";
import { AnalysisContext } from "@/lib/analysisContext";
import { EventChannel } from "@/lib/eventChannel";
import { logger } from "@/lib/logger";
import { startTimer } from "@/lib/perfTimer";
import { ClassificationQueue } from "@/lib/dsp/ClassificationQueue";
import { calculateDecibelsSpl, computeRms } from "@/lib/dsp/decibels";
import { DEFAULT_CLASSIFIER_CONFIG, HeuristicEventClassifier } from "@/lib/dsp/EventClassifier";
import { PeakEventDetector, detectionThresholdForSensitivity } from "@/lib/dsp/EventDetector";
import { FftSpectrumAnalyzer } from "@/lib/dsp/SpectrumAnalyzer";
import {
  createPcmBuffer,
  usableFrames,
  type CandidateEvent,
  type ClassifierConfig,
  type DetectionResult,
  type EventClassifier,
  type EventDetector,
  type FrequencySpectrum,
  type PcmBuffer,
  type RejectionReason,
  type SpectrumAnalyzer,
} from "@/lib/dsp/types";

// ── Public types ─────────────────────────────────────────────

export interface ClassifiedEvent {
  id: string;
  sessionId: string;
  /** Seconds since session start */
  timestamp: number;
  classification: Classification;
  spectrum: FrequencySpectrum;
  impactRatio: number;
  /** Copy of the originating buffer, only with includeBuffers */
  buffer?: PcmBuffer;
}

export type AnalysisListener = (event: ClassifiedEvent) => void;
export type SpectrumListener = (spectrum: FrequencySpectrum, timestamp: number) => void;
export type LevelListener = (decibelLevel: number, timestamp: number) => void;

export type ProcessResult = DetectionResult | { type: "inactive" };

export interface OrchestratorOptions {
  context?: AnalysisContext;
  classifierConfig?: Partial<ClassifierConfig>;
  detector?: EventDetector;
  analyzer?: SpectrumAnalyzer;
  classifier?: EventClassifier;
  /** Fixed RMS gate; when omitted it follows the context's sensitivity */
  detectionThreshold?: number;
  /** Attach a copy of the source buffer to each event (clip extraction) */
  includeBuffers?: boolean;
  /** Also emit sounds classified as unknown */
  emitUnknown?: boolean;
}

export interface OrchestratorStatus {
  state: AnalysisStatus;
  sessionId: string | null;
  ambient: AmbientSnapshot;
  pendingClassifications: number;
  buffersProcessed: number;
  candidates: number;
  eventsEmitted: number;
  unknownSounds: number;
  rejections: Record<RejectionReason, number>;
}

export function createSession(label?: string): AnalysisSession {
  return { id: randomUUID(), startedAt: new Date(), label };
}

// ── Internal types ───────────────────────────────────────────

interface ActiveSession {
  session: AnalysisSession;
  state: SessionAnalysisState;
  config: Readonly<ClassifierConfig>;
}

interface QueuedCandidate {
  candidate: CandidateEvent;
  ambientLevel: number;
  sensitivity: Readonly<SensitivityConfig>;
}

function emptyRejections(): Record<RejectionReason, number> {
  return { "invalid-buffer": 0, "below-threshold": 0, echo: 0 };
}

function resolveConfig(overrides: Partial<ClassifierConfig> = {}): Readonly<ClassifierConfig> {
  return Object.freeze({
    ...DEFAULT_CLASSIFIER_CONFIG,
    ...overrides,
    boundary: Object.freeze({ ...DEFAULT_CLASSIFIER_CONFIG.boundary, ...overrides.boundary }),
  });
}

/** Own the samples: the producer may reuse its memory after the call returns */
function copyBuffer(buffer: PcmBuffer, frames: number, timestamp: number): PcmBuffer {
  return createPcmBuffer(buffer.samples.slice(0, frames), buffer.sampleRate, timestamp);
}

// ── Orchestrator ─────────────────────────────────────────────

export class AnalysisOrchestrator {
  readonly context: AnalysisContext;
  private readonly detector: EventDetector;
  private readonly analyzer: SpectrumAnalyzer;
  private readonly classifier: EventClassifier;
  private readonly configOverrides: Partial<ClassifierConfig>;
  private readonly fixedThreshold: number | undefined;
  private readonly includeBuffers: boolean;
  private readonly emitUnknown: boolean;
  private readonly queue = new ClassificationQueue();

  private active: ActiveSession | null = null;
  private listeners = new Set<AnalysisListener>();
  private spectrumListeners = new Set<SpectrumListener>();
  private levelListeners = new Set<LevelListener>();
  private channels = new Set<EventChannel<ClassifiedEvent>>();

  private counters = {
    buffersProcessed: 0,
    candidates: 0,
    eventsEmitted: 0,
    unknownSounds: 0,
    rejections: emptyRejections(),
  };

  constructor(options: OrchestratorOptions = {}) {
    this.context = options.context ?? new AnalysisContext();
    this.detector = options.detector ?? new PeakEventDetector();
    this.analyzer = options.analyzer ?? new FftSpectrumAnalyzer();
    this.classifier = options.classifier ?? new HeuristicEventClassifier();
    this.configOverrides = options.classifierConfig ?? {};
    this.fixedThreshold = options.detectionThreshold;
    this.includeBuffers = options.includeBuffers ?? false;
    this.emitUnknown = options.emitUnknown ?? false;
    if (this.fixedThreshold !== undefined) this.detector.setThreshold(this.fixedThreshold);
  }

  get status(): AnalysisStatus {
    return this.active ? "analyzing" : "idle";
  }

  get session(): AnalysisSession | null {
    return this.active?.session ?? null;
  }

  /** Idempotent while a session is running */
  start(session: AnalysisSession = createSession()): AnalysisSession {
    if (this.active) return this.active.session;

    this.detector.reset();
    this.context.resetAmbient();
    this.counters = {
      buffersProcessed: 0,
      candidates: 0,
      eventsEmitted: 0,
      unknownSounds: 0,
      rejections: emptyRejections(),
    };
    this.active = {
      session,
      state: { lastConfirmed: null, lastLoud: null },
      config: resolveConfig(this.configOverrides),
    };
    logger.debug(`[AnalysisOrchestrator] session ${session.id} started`);
    return session;
  }

  /** Safe at any time. Pending classifications are discarded, open event streams end. */
  stop(): void {
    const active = this.active;
    this.queue.cancelAll();
    this.active = null;
    for (const channel of this.channels) channel.close();
    this.channels.clear();
    if (active) {
      logger.debug(
        `[AnalysisOrchestrator] session ${active.session.id} stopped after ${this.counters.eventsEmitted} events`
      );
    }
  }

  processBuffer(buffer: PcmBuffer, timestamp = buffer.timestamp): ProcessResult {
    const active = this.active;
    if (!active) return { type: "inactive" };

    const frames = usableFrames(buffer);
    if (frames === 0 || !Number.isFinite(timestamp)) {
      return { type: "none", reason: "invalid-buffer" };
    }
    this.counters.buffersProcessed++;

    const sensitivity = this.context.getSensitivity();
    const level = calculateDecibelsSpl(buffer, sensitivity.calibrationDb);
    // Digital silence is not a room measurement
    if (computeRms(buffer.samples, frames) > 0) this.context.ambient.addReading(level);
    this.notify(this.levelListeners, (l) => l(level, timestamp));
    // A level listener may have stopped the session
    if (this.active !== active) return { type: "inactive" };

    if (this.fixedThreshold === undefined) {
      this.detector.setThreshold(detectionThresholdForSensitivity(sensitivity.sensitivity));
    }

    const source = timestamp === buffer.timestamp
      ? buffer
      : createPcmBuffer(buffer.samples, buffer.sampleRate, timestamp, frames);
    const detection = this.detector.detect(source);
    if (detection.type !== "candidate") return detection;

    this.counters.candidates++;
    const job: QueuedCandidate = {
      candidate: {
        ...detection.candidate,
        buffer: copyBuffer(source, frames, timestamp),
      },
      ambientLevel: this.context.ambient.ambientLevel,
      sensitivity,
    };
    this.queue.enqueue((isCurrent) => this.classify(active, job, isCurrent));
    return detection;
  }

  /** Resolves once every queued classification has finished (or been discarded) */
  drain(): Promise<void> {
    return this.queue.drain();
  }

  subscribe(listener: AnalysisListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  onSpectrum(listener: SpectrumListener): () => void {
    this.spectrumListeners.add(listener);
    return () => {
      this.spectrumListeners.delete(listener);
    };
  }

  onLevel(listener: LevelListener): () => void {
    this.levelListeners.add(listener);
    return () => {
      this.levelListeners.delete(listener);
    };
  }

  /**
   * Ordered stream of events from now until the next stop() (or until the
   * signal aborts / the consumer breaks out of the loop).
   */
  events(signal?: AbortSignal): AsyncIterable<ClassifiedEvent> {
    const channel = new EventChannel<ClassifiedEvent>();
    if (signal?.aborted) {
      channel.close();
      return channel;
    }
    this.channels.add(channel);
    const onAbort = () => channel.close();
    signal?.addEventListener("abort", onAbort, { once: true });
    channel.whenClosed(() => {
      this.channels.delete(channel);
      signal?.removeEventListener("abort", onAbort);
    });
    return channel;
  }

  getStatus(): OrchestratorStatus {
    return {
      state: this.status,
      sessionId: this.active?.session.id ?? null,
      ambient: this.context.getAmbient(),
      pendingClassifications: this.queue.size,
      buffersProcessed: this.counters.buffersProcessed,
      candidates: this.counters.candidates,
      eventsEmitted: this.counters.eventsEmitted,
      unknownSounds: this.counters.unknownSounds,
      rejections: { ...this.counters.rejections },
    };
  }

  // ── Queue consumer ─────────────────────────────────────────

  private classify(active: ActiveSession, job: QueuedCandidate, isCurrent: () => boolean): void {
    const { candidate } = job;
    const stopSpectrum = startTimer("spectrum");
    const spectrum = this.analyzer.analyze(candidate.buffer);
    stopSpectrum();
    if (!spectrum) {
      this.counters.rejections["invalid-buffer"]++;
      return;
    }
    const live = () => isCurrent() && this.active === active;
    if (!live()) return;
    this.notify(this.spectrumListeners, (l) => l(spectrum, candidate.timestamp));
    if (!live()) return;

    const outcome = this.classifier.classify({
      candidate,
      spectrum,
      ambientLevel: job.ambientLevel,
      sensitivity: job.sensitivity,
      config: active.config,
      lastConfirmed: active.state.lastConfirmed,
      lastLoud: active.state.lastLoud,
      now: candidate.timestamp,
    });

    if (outcome.type === "rejected") {
      this.counters.rejections[outcome.reason]++;
      logger.debug(
        `[AnalysisOrchestrator] t=${candidate.timestamp.toFixed(3)}s rejected (${outcome.reason}, ${outcome.decibelLevel.toFixed(1)} dB)`
      );
      return;
    }

    const { classification, impactRatio } = outcome;
    if (classification.type === "unknown") {
      this.counters.unknownSounds++;
      if (!this.emitUnknown) return;
    } else {
      const mark = { timestamp: candidate.timestamp, decibelLevel: classification.decibelLevel };
      active.state.lastConfirmed = mark;
      active.state.lastLoud = mark;
    }

    const event: ClassifiedEvent = {
      id: randomUUID(),
      sessionId: active.session.id,
      timestamp: candidate.timestamp,
      classification,
      spectrum,
      impactRatio,
      ...(this.includeBuffers ? { buffer: candidate.buffer } : {}),
    };
    this.counters.eventsEmitted++;
    // Listeners may call stop(); nothing is delivered once it has returned
    for (const listener of this.listeners) {
      if (!live()) return;
      this.notify([listener], (l) => l(event));
    }
    if (!live()) return;
    for (const channel of this.channels) channel.push(event);
  }

  private notify<L>(listeners: Iterable<L>, call: (listener: L) => void): void {
    for (const listener of listeners) {
      try {
        call(listener);
      } catch (err) {
        logger.error("[AnalysisOrchestrator] listener failed:", err);
      }
    }
  }
}
