export * from "./types";
export * from "./zod";
