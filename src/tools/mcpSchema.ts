import { z, toJSONSchema } from 'zod';

export function zodToMcpInputSchema(schema: z.ZodType): Record<string, unknown> {
  const jsonSchema: Record<string, unknown> = { ...toJSONSchema(schema, {
    target: 'draft-07',
    io: 'input',
    reused: 'inline',
    unrepresentable: 'any',
  }) };

  delete jsonSchema.$schema;
  delete jsonSchema.$defs;
  delete jsonSchema['~standard'];

  const type = jsonSchema.type;
  if (type === undefined) {
    jsonSchema.type = 'object';
    return jsonSchema;
  }
  if (type !== 'object') {
    throw new Error(`Invalid MCP inputSchema: expected top-level type "object", got ${JSON.stringify(type)}`);
  }

  return jsonSchema;
}
