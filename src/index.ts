export * from "@/types/impact";

export {
  createPcmBuffer,
  pcmBufferFromChannels,
  totalBandEnergy,
  impactEnergyRatio,
} from "@/lib/dsp/types";
export type {
  PcmBuffer,
  FrequencySpectrum,
  CandidateEvent,
  DetectionResult,
  DetectionMiss,
  ClassifierConfig,
  BoundaryFrequencyRule,
  ClassificationOutcome,
  ClassifierInput,
  RejectionReason,
  SpectrumAnalyzer,
  EventDetector,
  EventClassifier,
} from "@/lib/dsp/types";

export {
  BASE_DBFS_TO_SPL_OFFSET,
  computeRms,
  computePeak,
  rmsToDbfs,
  dbfsToSpl,
  splToDbfs,
  decibelsToAmplitude,
  calculateDecibelsSpl,
  calculatePeakDecibelsSpl,
  normalizeSplForDisplay,
} from "@/lib/dsp/decibels";
export { AmbientLevelTracker, ambientThresholds, DEFAULT_AMBIENT_LEVEL } from "@/lib/dsp/AmbientLevelTracker";
export type { AmbientTrackerOptions } from "@/lib/dsp/AmbientLevelTracker";
export { FftSpectrumAnalyzer, DEFAULT_FFT_SIZE } from "@/lib/dsp/SpectrumAnalyzer";
export {
  PeakEventDetector,
  DEFAULT_DETECTION_THRESHOLD,
  detectionThresholdForSensitivity,
} from "@/lib/dsp/EventDetector";
export type { DetectorOptions } from "@/lib/dsp/EventDetector";
export {
  HeuristicEventClassifier,
  classifyCandidate,
  DEFAULT_CLASSIFIER_CONFIG,
} from "@/lib/dsp/EventClassifier";
export { BANDS, type BandName } from "@/lib/dsp/frequencyBands";

export { AnalysisContext, type AnalysisContextOptions } from "@/lib/analysisContext";
export { applySensitivityClamps, DEFAULT_SENSITIVITY, SENSITIVITY_LIMITS } from "@/lib/sensitivityClamps";
export {
  AnalysisOrchestrator,
  createSession,
  type ClassifiedEvent,
  type AnalysisListener,
  type OrchestratorOptions,
  type OrchestratorStatus,
  type ProcessResult,
} from "@/lib/AnalysisOrchestrator";
export {
  analyzeRecording,
  splitIntoBuffers,
  DEFAULT_BLOCK_SIZE,
  type RecordingAnalysisResult,
} from "@/lib/recordingAnalysis";
export {
  countByType,
  countByTimeSlot,
  peakActivitySlots,
  summarizeLevels,
  summarizeSession,
  DEFAULT_SLOT_SECONDS,
  type SessionSummary,
  type TimeSlotActivity,
} from "@/lib/sessionStats";
export { getTimings, clearTimings } from "@/lib/perfTimer";
