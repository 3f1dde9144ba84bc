import { defineTool } from "./registry.js";
import type {
  DataSource,
  ProcedureParams,
  TabularResult,
  Tool,
  ToolParameterSpec,
} from "../types.js";

export interface ProcedureParameter extends ToolParameterSpec {
  /** Filled from the session's routing key and hidden from the model */
  bindToRoutingKey?: boolean;
}

export interface ProcedureDefinition {
  name: string;
  description: string;
  /** Fully-qualified procedure name, e.g. dbo.selCustomerSearch */
  procedure: string;
  parameters: ProcedureParameter[];
}

/**
 * Stored-procedure tool.
 *
 * Only the arguments the model actually supplied are forwarded, in
 * declaration order. Parameters bound to the routing key never reach the
 * model: they are filled in here from the session.
 */
export function createProcedureTool(
  definition: ProcedureDefinition,
  source: DataSource,
  routingKey?: string,
): Tool {
  const visible = definition.parameters.filter((p) => !p.bindToRoutingKey);

  return defineTool(
    {
      name: definition.name,
      description: definition.description,
      parameters: visible.map(({ bindToRoutingKey: _bound, ...spec }) => spec),
    },
    async (args): Promise<TabularResult> => {
      const params: ProcedureParams = [];
      for (const param of definition.parameters) {
        if (param.bindToRoutingKey) {
          if (routingKey === undefined) {
            throw new Error(`Parameter ${param.name} needs a routing key`);
          }
          params.push({ name: param.name, value: coerceRoutingKey(param, routingKey) });
        } else if (args[param.name] !== undefined) {
          params.push({ name: param.name, value: args[param.name] });
        }
      }
      return source.callProcedure(definition.procedure, params);
    },
  );
}

function coerceRoutingKey(param: ProcedureParameter, routingKey: string): string | number {
  if (param.type === "integer" || param.type === "number") {
    const n = Number(routingKey);
    if (!Number.isFinite(n)) {
      throw new Error(`Routing key "${routingKey}" is not a valid ${param.type} for ${param.name}`);
    }
    return n;
  }
  return routingKey;
}
