export type PromptName =
  | 'name_detection'
  | 'intent_classification'
  | 'task_assignment'
  | 'buddy_response'
  | 'general_conversation'
  | 'task_relevance';

export type PromptVariables = Record<string, string>;

/**
 * Source of prompt templates.
 */
export interface IPromptLoader {
  /**
   * Render a template, replacing each `{{name}}` with its variable.
   * Placeholders without a variable render as an empty string.
   */
  render(name: PromptName, variables: PromptVariables): Promise<string>;
}
