export * from "./structure";
export * from "./query";
export * from "./sets";
export * from "./search";
export * from "./combinatorics";
export * from "./random";
