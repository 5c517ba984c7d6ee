/**
 * Utils barrel exports
 */

export * from "./text/removeDiacritics";
export * from "./text/textNormalization";
export * from "./taxonomyValidation";
export * from "./dbErrors";
