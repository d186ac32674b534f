//
//
//

export type { AsciiSource } from "./asciiSource";
export type { ImageStore } from "./imageStore";
