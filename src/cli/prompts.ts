/**
 * Interactive Prompt Utilities
 *
 * Wrapper functions around @clack/prompts providing consistent behavior,
 * default value display, and validation.
 */

import { text, confirm, select, isCancel, cancel } from "@clack/prompts";

/**
 * Thrown when the user cancels a prompt (Ctrl+C / Esc).
 */
export class PromptCancelledError extends Error {
  constructor() {
    super("Operation cancelled by user");
    this.name = "PromptCancelledError";
  }
}

function exitOnCancel<T>(result: T | symbol): T {
  if (isCancel(result)) {
    cancel("cancelled");
    throw new PromptCancelledError();
  }
  return result;
}

/**
 * Format a value as a hint string for display in prompts.
 */
export function formatDefaultHint(value: string | number | boolean | readonly string[] | undefined): string {
  if (value === undefined) {
    return "none";
  }
  if (typeof value === "boolean") {
    return value ? "yes" : "no";
  }
  if (typeof value === "string" || typeof value === "number") {
    return String(value);
  }
  return value.length === 0 ? "none" : value.join(", ");
}

/**
 * Prompt for a number with validation and default value display.
 * Returns string - caller should parse to number if needed.
 *
 * If user presses enter without input, the defaultValue is returned.
 */
export async function promptNumber(
  message: string,
  options?: {
    defaultValue?: string | number;
    validator?: (v: string) => boolean | string;
    placeholder?: string;
  }
): Promise<string> {
  const { defaultValue, validator, placeholder } = options ?? {};

  // @clack/prompts has no hint slot, so the default goes in the message
  const messageWithDefault =
    defaultValue !== undefined ? `${message} (default: ${formatDefaultHint(defaultValue)})` : message;

  const result = exitOnCancel(
    await text({
      message: messageWithDefault,
      defaultValue: String(defaultValue ?? ""),
      placeholder,
      validate: (v: string) => {
        if (v.trim() === "" && defaultValue !== undefined) {
          return undefined;
        }
        if (v.trim() === "") {
          return "Value is required";
        }
        if (validator) {
          const validationResult = validator(v);
          return validationResult === true ? undefined : String(validationResult);
        }
        return undefined;
      },
    })
  );

  if (result.trim() === "" && defaultValue !== undefined) {
    return String(defaultValue);
  }

  return result;
}

/**
 * Prompt for a string with validation and default value display.
 *
 * If user presses enter without input, the defaultValue is returned.
 */
export async function promptString(
  message: string,
  options?: {
    defaultValue?: string;
    validator?: (v: string) => boolean | string;
    placeholder?: string;
  }
): Promise<string> {
  const { defaultValue, validator, placeholder } = options ?? {};

  const messageWithDefault =
    defaultValue !== undefined ? `${message} (default: ${defaultValue})` : message;

  const result = exitOnCancel(
    await text({
      message: messageWithDefault,
      defaultValue,
      placeholder,
      validate: (v: string) => {
        if (v.trim() === "" && defaultValue !== undefined) {
          return undefined;
        }
        if (validator) {
          const validationResult = validator(v);
          return validationResult === true ? undefined : String(validationResult);
        }
        return undefined;
      },
    })
  );

  if (result.trim() === "" && defaultValue !== undefined) {
    return defaultValue;
  }

  return result;
}

/**
 * Prompt for yes/no confirmation with default value display.
 */
export async function promptConfirm(message: string, defaultValue?: boolean): Promise<boolean> {
  return exitOnCancel(
    await confirm({
      message,
      initialValue: defaultValue ?? false,
    })
  );
}

export interface SelectChoice {
  value: string;
  label: string;
  hint?: string;
}

/**
 * Prompt for one of a fixed set of values.
 */
export async function promptSelect(
  message: string,
  choices: readonly SelectChoice[],
  initialValue?: string
): Promise<string> {
  return exitOnCancel(
    await select({
      message,
      options: choices.map((c) => ({ value: c.value, label: c.label, hint: c.hint })),
      initialValue,
    })
  );
}

/**
 * Prompt for comma-separated list of items with empty values allowed.
 * Returns empty array if user provides empty input.
 *
 * If user presses enter without input, the defaultValue is returned.
 */
export async function promptCommaList(
  message: string,
  options?: {
    defaultValue?: string[];
    placeholder?: string;
    validator?: (items: string[]) => boolean | string;
  }
): Promise<string[]> {
  const { defaultValue, placeholder, validator } = options ?? {};

  const messageWithDefault = `${message} (default: ${formatDefaultHint(defaultValue)})`;

  const result = exitOnCancel(
    await text({
      message: messageWithDefault,
      defaultValue: defaultValue?.join(", ") ?? "",
      placeholder: placeholder ?? "name1, name2, name3",
      validate: (v: string) => {
        if (!validator || v.trim() === "") return undefined;
        const validationResult = validator(parseCommaList(v));
        return validationResult === true ? undefined : String(validationResult);
      },
    })
  );

  const trimmed = result.trim();
  if (!trimmed) {
    return defaultValue ?? [];
  }

  return parseCommaList(trimmed);
}

/**
 * Split a comma-separated option value, dropping empty entries.
 *
 * @example
 * ```ts
 * parseCommaList("Lemon, , Wind Archer"); // ["Lemon", "Wind Archer"]
 * ```
 */
export function parseCommaList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
