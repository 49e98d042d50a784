export * from "./file-store";
export * from "./keychain-store";
export * from "./resolver";
export * from "./types";
export * from "./unavailable-store";
