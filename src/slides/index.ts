export { CONTENT_DETECTOR_CONFIDENCE, createSceneChange, SceneDetector } from './detector.js'
export type { SceneDetectorOptions } from './detector.js'
export {
  DEFAULT_DETECTION_SETTINGS,
  DEFAULT_SLIDE_SETTINGS,
  resolveDetectionSettings,
  resolveSlideSettings,
} from './settings.js'
export type { DetectionSettingsInput, SlideSettings, SlideSettingsInput } from './settings.js'
export { createFrameComparator } from './similarity.js'
export type {
  ContentSceneDetector,
  DetectionSettings,
  Frame,
  FrameComparator,
  FrameDissimilarity,
  RgbImage,
  SceneChange,
  SceneChangeMethod,
  SlideContent,
  SlideWindow,
} from './types.js'
export {
  assignTranscriptToWindows,
  buildSlideWindows,
  filterWindowsWithTranscript,
  segmentOverlapsWindow,
} from './windows.js'
