export {
  ImageBuilder,
  createImage,
  type BuildResult,
} from "./image-builder.ts";
export {
  SizeInflator,
  inflateImage,
  type InflateResult,
} from "./size-inflator.ts";
export {
  inspectImage,
  type InspectionReport,
  type SeedPresence,
} from "./image-inspector.ts";
