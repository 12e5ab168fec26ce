export {
  ImageNormalizer,
  containFit,
  loadSharp,
  type DeviceImage,
  type EngineLoader,
  type ImageEngine,
  type NormalizeOptions,
  type NormalizeTarget,
  type NormalizedImage,
  type RawImage,
} from "./image-normalizer.ts";
export { MediaDetector, type MediaInfo } from "./media-detector.ts";
export {
  andThen,
  degraded,
  failed,
  ok,
  unwrap,
  type StageResult,
} from "./pipeline.ts";
