export { Transition, isTransition } from "./types/contracts.js";
export type { CompletionHook, DescriptionRenderer, LineEditor, StepContext } from "./types/contracts.js";
export { Step } from "./orchestrator/step.js";
export { Runner, runPlaybook, HALT_EXIT_CODE, type RunOptions } from "./orchestrator/run.js";
export { SerialPlaybook, serial } from "./orchestrator/serial.js";
export { AcceptUserInput, type InputOptions } from "./tasks/input.js";
export { Confirm } from "./tasks/confirm.js";
export { PathPrompt, type PathPromptOptions } from "./tasks/path.js";
export { collectCandidates, prefixCompleter } from "./tasks/completion.js";
export { ConsoleRenderer, renderDescription, dedent, wrap } from "./prompt/renderer.js";
export { ReadlineEditor, type ReadlineEditorOptions } from "./io/lineEditor.js";
export { loadHistory, saveHistory } from "./io/history.js";
export { loadConfig, expandHome, type PlaybookConfig } from "./config.js";
export { PlaybookError, createError, formatError, type PlaybookErrorCode } from "./errors.js";
