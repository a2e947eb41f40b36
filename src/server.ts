import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import * as z from 'zod';
import type { NetcfgTreeConfig } from './config.js';
import {
  extractProperties,
  extractSectionEntries,
  findInConfig,
  getConfigTree,
  getSection,
  listConfigs,
  listInterfaces,
} from './tree/api.js';

const diagnosticSchema = z.object({
  severity: z.enum(['error', 'warning']),
  code: z.string(),
  message: z.string(),
  line: z.number().optional(),
});

const diagnosticsOutput = {
  errors: z.array(diagnosticSchema),
  warnings: z.array(diagnosticSchema),
};

/**
 * Wrap a structured result as an MCP tool response (JSON text + structured content).
 */
function toolResult<T extends Record<string, unknown>>(value: T): {
  content: { type: 'text'; text: string }[];
  structuredContent: T;
} {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
    structuredContent: value,
  };
}

/**
 * Create an MCP server instance and register all tools.
 *
 * Tool naming convention:
 * - `config.*` operates on one config file (by `configId`, its file name),
 *   except `config.list`.
 *
 * Query tools never fail on a bad or ambiguous pattern: they return an empty
 * or partial result plus `errors`/`warnings`.
 */
export function createMcpServer(config: NetcfgTreeConfig): McpServer {
  const server = new McpServer({ name: 'netcfg-tree-mcp', version: '0.1.0' });

  server.registerTool(
    'config.list',
    {
      title: 'List config files',
      description: 'List device configuration files under the configs directory.',
      inputSchema: {
        query: z.string().optional(),
      },
      outputSchema: {
        configs: z.array(
          z.object({
            configId: z.string(),
            path: z.string(),
            hostname: z.string().nullable(),
            lines: z.number(),
            interfaces: z.number(),
            etag: z.string(),
          })
        ),
      },
    },
    async ({ query }) => toolResult({ configs: await listConfigs(config, { query }) })
  );

  server.registerTool(
    'config.tree',
    {
      title: 'Get the line tree of a config',
      description:
        'Parse a config file and return its lines, nested by indentation (tree) or as rows with depth and parent (flat).',
      inputSchema: {
        configId: z.string(),
        view: z.enum(['tree', 'flat']).optional(),
      },
      outputSchema: {
        lines: z.array(z.any()),
        etag: z.string(),
        ...diagnosticsOutput,
      },
    },
    async ({ configId, view }) => toolResult(await getConfigTree(config, { configId, view }))
  );

  server.registerTool(
    'config.find',
    {
      title: 'Find lines by regex',
      description:
        'Return lines matching a JavaScript regex. With `group` (name or index) return the captured values; with group "ALL" return every named group of each match.',
      inputSchema: {
        configId: z.string(),
        pattern: z.string(),
        flags: z.string().optional(),
        group: z.union([z.string(), z.number().int().nonnegative()]).optional(),
      },
      outputSchema: {
        matches: z.array(z.any()),
        ...diagnosticsOutput,
      },
    },
    async ({ configId, pattern, flags, group }) =>
      toolResult(await findInConfig(config, { configId, pattern, flags, group }))
  );

  server.registerTool(
    'config.section',
    {
      title: 'Get a config section',
      description:
        'Walk parent lines by a chain of regexes (each must match exactly one parent) and return the children of the last one.',
      inputSchema: {
        configId: z.string(),
        parents: z.array(z.string()).min(1),
      },
      outputSchema: {
        lines: z.array(z.any()),
        ...diagnosticsOutput,
      },
    },
    async ({ configId, parents }) => toolResult(await getSection(config, { configId, parents }))
  );

  server.registerTool(
    'config.extract',
    {
      title: 'Extract line properties',
      description:
        'For each line matching candidatePattern, merge the named groups of `patterns` (matched against that same line) into one object.',
      inputSchema: {
        configId: z.string(),
        candidatePattern: z.string(),
        patterns: z.array(z.string()).min(1),
      },
      outputSchema: {
        entries: z.array(z.record(z.string(), z.string().nullable())),
        ...diagnosticsOutput,
      },
    },
    async ({ configId, candidatePattern, patterns }) =>
      toolResult(await extractProperties(config, { configId, candidatePattern, patterns }))
  );

  server.registerTool(
    'config.sectionExtract',
    {
      title: 'Extract section properties',
      description:
        'For each line matching `parent`, merge its named groups with those of the single direct child matching each of `patterns`.',
      inputSchema: {
        configId: z.string(),
        parent: z.string(),
        patterns: z.array(z.string()).min(1),
        withLine: z.boolean().optional(),
      },
      outputSchema: {
        entries: z.array(z.any()),
        ...diagnosticsOutput,
      },
    },
    async ({ configId, parent, patterns, withLine }) =>
      toolResult(await extractSectionEntries(config, { configId, parent, patterns, withLine }))
  );

  server.registerTool(
    'config.interfaces',
    {
      title: 'List interfaces',
      description: 'List interface declarations with description, shutdown state and IPv4 addresses.',
      inputSchema: {
        configId: z.string(),
      },
      outputSchema: {
        interfaces: z.array(
          z.object({
            name: z.string(),
            line: z.number(),
            description: z.string().nullable(),
            shutdown: z.boolean(),
            ipv4Addresses: z.array(
              z.object({ address: z.string(), mask: z.string(), secondary: z.boolean() })
            ),
          })
        ),
        etag: z.string(),
      },
    },
    async ({ configId }) => toolResult(await listInterfaces(config, { configId }))
  );

  return server;
}

/**
 * Start the server over stdio.
 */
export async function runStdioServer(config: NetcfgTreeConfig): Promise<void> {
  const server = createMcpServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
