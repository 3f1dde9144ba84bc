import type { Logger } from "pino";
import type { SessionFactory } from "./session-table.js";
import type { SessionParts } from "./session.js";
import { ToolRegistry } from "../tools/registry.js";
import { createCatalogTools } from "../tools/catalog.js";
import { createExportTool, type ExportToolOptions } from "../tools/export.js";
import type { ProcedureDefinition } from "../tools/procedure.js";
import { buildSystemPrompt, formatDate, type PromptSection } from "../prompt/system-prompt.js";
import type { DataSource } from "../types.js";

export interface ProcedureSessionFactoryOptions {
  catalog: ProcedureDefinition[];
  /** Opens the data source a session owns; closed when the session is deleted */
  openDataSource: (routingKey: string) => Promise<DataSource>;
  /** Omit to run without an export tool */
  export?: ExportToolOptions;
  extraSections?: PromptSection[];
  logger: Logger;
  now?: () => Date;
}

/**
 * Default session factory: one data source per session, one procedure
 * tool per catalog entry, plus the export tool.
 */
export function createProcedureSessionFactory(
  options: ProcedureSessionFactoryOptions,
): SessionFactory {
  const now = options.now ?? (() => new Date());

  return {
    async create(routingKey: string): Promise<SessionParts> {
      const source = await options.openDataSource(routingKey);
      try {
        const registry = new ToolRegistry(options.logger);
        for (const tool of createCatalogTools(options.catalog, source, routingKey)) {
          registry.register(tool);
        }

        let exportToolName: string | undefined;
        if (options.export) {
          const exportTool = createExportTool(options.export);
          exportToolName = exportTool.descriptor.name;
          registry.register(exportTool);
        }

        const systemPrompt = buildSystemPrompt({
          routingKey,
          currentDate: formatDate(now()),
          tools: registry.describeAll(),
          exportToolName,
          extraSections: options.extraSections,
        });

        return { registry, systemPrompt, resources: [source], exportToolName };
      } catch (err) {
        await source.close().catch((closeErr: unknown) => {
          options.logger.error({ err: closeErr }, "failed to close data source after setup error");
        });
        throw err;
      }
    },
  };
}
