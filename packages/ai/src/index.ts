export * from "./config";
export * from "./lib/ai-clients";
export * from "./transcription/transcribe-audio";
export * from "./duplicates/detect-duplicates";
export * from "./accents/identify-accent-words";
