import type { ZodError } from 'zod';

/** JSON-schema-like input contract advertised to the model and on `/tools/list`. */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
  additionalProperties?: boolean;
}

export function objectSchema(properties: Record<string, unknown>, required: string[]): ToolInputSchema {
  return {
    type: 'object',
    properties,
    required,
    additionalProperties: false,
  };
}

export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : 'input';
      return `${location}: ${issue.message}`;
    })
    .join('; ');
}
