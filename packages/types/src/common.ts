/**
 * @module
 * Primitive validation schemas shared across spanwise packages.
 */

import { type } from "arktype";

/** URL validation */
export const url = type("string.url");

/** Non-empty string */
export const nonEmptyString = type("string >= 1");

/** Positive integer */
export const positiveInt = type("number.integer > 0");
