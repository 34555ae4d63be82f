/**
 * Constants module for @keyturn/core.
 */

export * from "./defaults";
