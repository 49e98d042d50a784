// Constants
export * from "./constants";
// Endpoint authentication requirements
export * from "./endpoints";
// OAuth types, schemas and token helpers
export * from "./oauth";
// Site to host mapping
export * from "./site";
