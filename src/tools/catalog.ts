import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError, describeError } from "../errors.js";
import { createProcedureTool, type ProcedureDefinition } from "./procedure.js";
import type { DataSource, Tool, ToolParameterSchema } from "../types.js";

/**
 * Procedure catalog: the stored procedures exposed as tools,
 * loaded from a JSON file.
 */

const ParameterSchemaSchema: z.ZodType<ToolParameterSchema> = z.lazy(() =>
  z.object({
    type: z.string().min(1),
    description: z.string().optional(),
    enum: z.array(z.union([z.string(), z.number()])).optional(),
    items: ParameterSchemaSchema.optional(),
    properties: z.record(ParameterSchemaSchema).optional(),
    required: z.array(z.string()).optional(),
  }),
);

const ProcedureParameterSchema = z.object({
  name: z.string().min(1),
  type: z.enum(["string", "integer", "number", "boolean", "array", "object"]),
  description: z.string().min(1),
  enum: z.array(z.union([z.string(), z.number()])).optional(),
  items: ParameterSchemaSchema.optional(),
  properties: z.record(ParameterSchemaSchema).optional(),
  required: z.boolean().optional(),
  bindToRoutingKey: z.boolean().optional(),
});

const ProcedureSchema = z
  .object({
    name: z.string().regex(/^[A-Za-z0-9_-]{1,64}$/, "tool names may only use letters, digits, _ and -"),
    description: z.string().min(1),
    procedure: z.string().min(1),
    parameters: z.array(ProcedureParameterSchema).default([]),
  })
  .refine(
    (p) => new Set(p.parameters.map((param) => param.name)).size === p.parameters.length,
    { message: "parameter names must be unique" },
  );

const CatalogSchema = z
  .object({ procedures: z.array(ProcedureSchema) })
  .refine(
    (c) => new Set(c.procedures.map((p) => p.name)).size === c.procedures.length,
    { message: "procedure tool names must be unique" },
  );

export function parseProcedureCatalog(raw: unknown): ProcedureDefinition[] {
  const parsed = CatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid procedure catalog: ${issues}`);
  }
  return parsed.data.procedures;
}

export async function loadProcedureCatalog(path: string): Promise<ProcedureDefinition[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigError(
      `Cannot read procedure catalog ${path}: ${describeError(err)}`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(
      `Procedure catalog ${path} is not valid JSON: ${describeError(err)}`,
    );
  }
  return parseProcedureCatalog(raw);
}

/** One tool per catalog entry, all bound to the same data source */
export function createCatalogTools(
  catalog: ProcedureDefinition[],
  source: DataSource,
  routingKey?: string,
): Tool[] {
  return catalog.map((definition) => createProcedureTool(definition, source, routingKey));
}
