//
//
//

export { Dimensions } from "./dimensions";
export { GridSize, GlyphCell } from "./grid";
export { Color, Palette } from "./color";
export { AsciiBlock } from "./ascii";
export type { FitReport } from "./ascii";
export type { RenderSettings, ToolSettings } from "./settings";
