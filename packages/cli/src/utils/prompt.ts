/**
 * Interactive prompt utilities
 *
 * Uses the "prompts" package for user interaction
 */
import prompts, { type PromptObject } from "prompts";

/**
 * Prompt cancellation error
 */
export class PromptCancelledError extends Error {
  constructor() {
    super("Prompt cancelled by user");
    this.name = "PromptCancelledError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Handle cancelled prompts
 */
function onCancel(): void {
  throw new PromptCancelledError();
}

/**
 * Check if a value is the cancellation signal
 */
function isCancelled(response: Record<string, unknown>): boolean {
  return Object.keys(response).length === 0;
}

/**
 * Password prompt options
 */
export interface PasswordOptions {
  /** Validation function */
  validate?: (value: string) => boolean | string;
}

/**
 * Password prompt - hidden input
 *
 * @throws PromptCancelledError if user cancels
 */
export async function password(
  message: string,
  options: PasswordOptions = {}
): Promise<string> {
  const promptObj: PromptObject = {
    type: "password",
    name: "value",
    message,
  };

  const validate = options.validate;
  if (validate) {
    promptObj.validate = (value: string) => {
      const result = validate(value);
      if (result === false) {
        return "Invalid input";
      }
      return result;
    };
  }

  const response = await prompts(promptObj, { onCancel });

  if (isCancelled(response)) {
    throw new PromptCancelledError();
  }

  const value: unknown = response.value;
  return typeof value === "string" ? value : "";
}
