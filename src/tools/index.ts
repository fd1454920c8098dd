export { calculateTool, validateExpressionTool } from "./calculate.ts";
export { keypadTool } from "./keypad.ts";
export { clearKeypadTool, listKeypadsTool } from "./sessions.ts";
