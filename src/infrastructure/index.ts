//
//
//

export { ExternalAsciiSource } from "./converter";
export type { ConverterOptions } from "./converter";
export { FileImageStore } from "./files";
export { ImageFitter } from "./magick";
export { describeFailure, execFileRunner, formatCommand } from "./process";
export type { CommandOutput, CommandRunner, RunOptions } from "./process";
