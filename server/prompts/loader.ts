import { PROMPT_TEMPLATES, type PromptName } from '../../shared/prompts';

export type PromptVariables = Record<string, string>;

/**
 * Fills `{NAME}` placeholders in a template. Substituted values are not scanned
 * again, so page text containing `{URL}` stays literal. Unknown placeholders are left as they are.
 */
export const renderPrompt = (name: PromptName, variables: PromptVariables): string =>
  PROMPT_TEMPLATES[name].replace(/\{([A-Z_]+)\}/g, (placeholder, key: string) => variables[key] ?? placeholder);
