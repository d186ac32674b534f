//
//
//

export * from "./errors";
export { FontFace, isBlank, REFERENCE_GLYPH } from "./font";
export { Pipeline } from "./pipeline";
export type { RenderJob, RenderResult } from "./pipeline";
export type { AsciiSource, ImageStore } from "./ports";
export { CanvasRenderer } from "./renderer";
export type { RenderedImage, RenderOptions } from "./renderer";
export { PRESETS, gridFor, isPreset, parseResolution, resolveResolution } from "./resolution";
export type { Preset, ResolutionSelection } from "./resolution";
export * from "./structs";
