import { jsonrepair } from 'jsonrepair';
import { z } from 'zod';
import { StructuredOutputError, errorMessage } from '../core/errors';

function parseLoose(content: string): unknown {
  try {
    // First, try to parse directly
    return JSON.parse(content);
  } catch (directError) {
    // Models often wrap the object in prose or code fences
    const firstBracket = content.indexOf('{');
    const lastBracket = content.lastIndexOf('}');

    if (firstBracket === -1 || lastBracket === -1 || firstBracket >= lastBracket) {
      throw new StructuredOutputError('No JSON object found in model output', {
        preview: content.substring(0, 200),
      });
    }

    try {
      return JSON.parse(jsonrepair(content.substring(firstBracket, lastBracket + 1)));
    } catch (repairError) {
      throw new StructuredOutputError(`JSON repair failed: ${errorMessage(repairError)}`, {
        parseError: errorMessage(directError),
        preview: content.substring(0, 200),
      });
    }
  }
}

/**
 * Parses a model response against a schema. Throws StructuredOutputError when
 * the content is not JSON (even after repair) or does not match the schema.
 */
export function parseStructured<S extends z.ZodTypeAny>(content: string, schema: S): z.infer<S> {
  const parsed = schema.safeParse(parseLoose(content));
  if (!parsed.success) {
    throw new StructuredOutputError('Model output did not match the expected schema', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}
