/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/collectedPostingsRepo";
export * from "./repos/normalizedPostingsRepo";
export * from "./repos/runsRepo";
export * from "./repos/titleCandidatesRepo";
