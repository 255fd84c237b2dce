export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./docxDocument";
export * from "./docxSerializer";
export * from "./docxExtractor";
export * from "./styleResolver";
export * from "./textRuns";
export * from "./structureTracker";
export * from "./markdownTable";
export * from "./blockDispatcher";
export * from "./docxExporter";
export * from "./styleMerge";
export * from "./shelfSchema";
export * from "./blobFetcher";
export * from "./imageCodec";
export * from "./pictures";
export * from "./video";
export * from "./objectStore";
export * from "./snippetResolver";
