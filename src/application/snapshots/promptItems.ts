import { ValidationError } from "../../core/errors";
import type { SnapshotTriggerItem } from "../../core/snapshots/SnapshotJob";

export const CHATGPT_DATASET_ID = "gd_m7aof0k82r803d5bjm";
const CHATGPT_URL = "https://chatgpt.com/";

export type PromptOptions = {
  country?: string | readonly string[];
  additionalPrompt?: string | readonly string[];
  webSearch?: boolean | readonly boolean[];
};

// A scalar applies to every prompt; a list must line up with the prompts one to one.
const broadcast = <T extends string | boolean>(
  value: T | readonly T[],
  count: number,
  name: string,
  isValid: (item: unknown) => item is T,
  typeMessage: string
): T[] => {
  const list: readonly unknown[] = Array.isArray(value) ? value : Array.from({ length: count }, () => value);
  if (list.length !== count) {
    throw new ValidationError(`${name} list must have same length as prompts list`);
  }
  return list.map((item) => {
    if (!isValid(item)) throw new ValidationError(typeMessage);
    return item;
  });
};

const isString = (item: unknown): item is string => typeof item === "string";
const isBoolean = (item: unknown): item is boolean => typeof item === "boolean";

export const buildPromptItems = (
  prompt: string | readonly string[],
  options: PromptOptions = {}
): SnapshotTriggerItem[] => {
  const prompts: readonly unknown[] = Array.isArray(prompt) ? prompt : [prompt];
  if (prompts.length === 0) {
    throw new ValidationError("At least one prompt is required");
  }
  const validPrompts = prompts.map((p) => {
    if (typeof p !== "string" || p === "") throw new ValidationError("All prompts must be non-empty strings");
    return p;
  });

  const count = validPrompts.length;
  const countries = broadcast(options.country ?? "", count, "country", isString, "All countries must be strings");
  const additionalPrompts = broadcast(
    options.additionalPrompt ?? "",
    count,
    "additional_prompt",
    isString,
    "All additional_prompts must be strings"
  );
  const webSearches = broadcast(
    options.webSearch ?? false,
    count,
    "web_search",
    isBoolean,
    "All web_search values must be booleans"
  );

  return validPrompts.map((p, i) => ({
    url: CHATGPT_URL,
    prompt: p,
    country: countries[i],
    additional_prompt: additionalPrompts[i],
    web_search: webSearches[i]
  }));
};
