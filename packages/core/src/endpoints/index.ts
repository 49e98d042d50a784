export * from "./table";
export * from "./types";
export * from "./utils";
