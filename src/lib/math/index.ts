/**
 * Math module barrel export
 * Re-exports the expression pipeline: operators, preprocessing, tokenizer,
 * postfix conversion, evaluation, and formatting
 */

export * from "./evaluator.ts";
export * from "./format.ts";
export * from "./operators.ts";
export * from "./postfix.ts";
export * from "./preprocess.ts";
export * from "./tokenizer.ts";
export * from "./types.ts";
