export * from "./errors";
export * from "./capabilities";

export type * from "./types/transcript";
export type * from "./types/cut-plan";
export * from "./types/timeline";

export * from "./utils/ids";
export * from "./utils/time";
export * from "./utils/words";
export * from "./utils/file";

export * from "./transcript/transcript";
export * from "./cut-plan/build-cut-plan";
export * from "./cut-plan/cut-plan";

export * from "./timeline/schema";
export * from "./timeline/project";
export * from "./timeline/validate";
export * from "./timeline/text-track";
export * from "./timeline/apply-cut-plan";

export * from "./persistence/save";
export * from "./persistence/discovery";
