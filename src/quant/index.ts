/**
 * Quant — barrel export
 */

export * from "./greeks.js";
