/**
 * Parameter Direction Value Object
 */

export type ParameterDirection =
  | "Input"
  | "Output"
  | "InputOutput"
  | "ReturnValue";

/**
 * Directions whose value is written back by the driver after execution
 */
export function isOutputDirection(direction: ParameterDirection): boolean {
  return direction !== "Input";
}

/**
 * Directions that send a value to the server
 */
export function carriesInputValue(direction: ParameterDirection): boolean {
  return direction === "Input" || direction === "InputOutput";
}
