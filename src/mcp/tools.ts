import { z } from 'zod';
import { LibraryPanelError } from '../errors';
import type { JsonValue, RequestContext } from '../models/types';
import type { LibraryPanelService } from '../services/LibraryPanelService';
import { debug, logger } from '../utils/logger';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

const actorArgs = {
  org_id: z.number().int().positive(),
  user_id: z.number().int().positive(),
};
const uidArg = { uid: z.string().min(1) };
const dashboardArg = { dashboard_id: z.number().int() };
const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)])
);
const modelArg = z.record(jsonValue);

const argSchemas = {
  create_library_panel: z.object({
    ...actorArgs,
    folder_id: z.number().int().nonnegative().default(0),
    name: z.string().min(1),
    model: modelArg,
  }),
  get_library_panel: z.object({ ...actorArgs, ...uidArg }),
  list_library_panels: z.object(actorArgs),
  patch_library_panel: z.object({
    ...actorArgs,
    ...uidArg,
    folder_id: z.number().int().nonnegative().optional(),
    name: z.string().optional(),
    model: modelArg.nullable().optional(),
  }),
  delete_library_panel: z.object({ ...actorArgs, ...uidArg }),
  connect_dashboard: z.object({ ...actorArgs, ...uidArg, ...dashboardArg }),
  disconnect_dashboard: z.object({ ...actorArgs, ...uidArg, ...dashboardArg }),
  list_connected_dashboards: z.object({ ...actorArgs, ...uidArg }),
};

const actorProperties = {
  org_id: { type: 'number', description: 'Organization the caller acts in' },
  user_id: { type: 'number', description: 'Id of the acting user' },
};
const uidProperty = { uid: { type: 'string', description: 'Library panel uid' } };
const dashboardProperty = { dashboard_id: { type: 'number', description: 'Dashboard id' } };

/**
 * Tool list for ListTools. Every tool takes the actor context (`org_id`,
 * `user_id`) that an authenticating front end would otherwise supply.
 */
export const toolDefinitions = [
  {
    name: 'create_library_panel',
    description: 'Create a library panel; returns it with its generated uid',
    inputSchema: {
      type: 'object' as const,
      properties: {
        ...actorProperties,
        folder_id: { type: 'number', description: 'Folder id, 0 for the root folder' },
        name: { type: 'string', description: 'Panel name, unique within its folder' },
        model: { type: 'object', description: 'Panel definition, stored as-is' },
      },
      required: ['org_id', 'user_id', 'name', 'model'],
    },
  },
  {
    name: 'get_library_panel',
    description: 'Fetch one library panel by uid',
    inputSchema: {
      type: 'object' as const,
      properties: { ...actorProperties, ...uidProperty },
      required: ['org_id', 'user_id', 'uid'],
    },
  },
  {
    name: 'list_library_panels',
    description: 'List every library panel of the organization, in no particular order',
    inputSchema: {
      type: 'object' as const,
      properties: { ...actorProperties },
      required: ['org_id', 'user_id'],
    },
  },
  {
    name: 'patch_library_panel',
    description:
      'Update a library panel. Omitted fields, a zero folder_id, an empty name and a null model keep their stored values',
    inputSchema: {
      type: 'object' as const,
      properties: {
        ...actorProperties,
        ...uidProperty,
        folder_id: { type: 'number', description: 'New folder id' },
        name: { type: 'string', description: 'New name' },
        model: { type: ['object', 'null'], description: 'New panel definition' },
      },
      required: ['org_id', 'user_id', 'uid'],
    },
  },
  {
    name: 'delete_library_panel',
    description: 'Delete a library panel. Its dashboard connections are left in place',
    inputSchema: {
      type: 'object' as const,
      properties: { ...actorProperties, ...uidProperty },
      required: ['org_id', 'user_id', 'uid'],
    },
  },
  {
    name: 'connect_dashboard',
    description: 'Connect a library panel to a dashboard. Connecting twice is a no-op',
    inputSchema: {
      type: 'object' as const,
      properties: { ...actorProperties, ...uidProperty, ...dashboardProperty },
      required: ['org_id', 'user_id', 'uid', 'dashboard_id'],
    },
  },
  {
    name: 'disconnect_dashboard',
    description: 'Remove the connection between a library panel and a dashboard',
    inputSchema: {
      type: 'object' as const,
      properties: { ...actorProperties, ...uidProperty, ...dashboardProperty },
      required: ['org_id', 'user_id', 'uid', 'dashboard_id'],
    },
  },
  {
    name: 'list_connected_dashboards',
    description: 'List the ids of dashboards connected to a library panel, in no particular order',
    inputSchema: {
      type: 'object' as const,
      properties: { ...actorProperties, ...uidProperty },
      required: ['org_id', 'user_id', 'uid'],
    },
  },
];

function text(value: string): ToolResult {
  return { content: [{ type: 'text', text: value }] };
}

function json(value: unknown): ToolResult {
  return text(JSON.stringify(value, null, 2));
}

function failure(message: string): ToolResult {
  return { isError: true, content: [{ type: 'text', text: message }] };
}

function contextOf(args: { org_id: number; user_id: number }, signal?: AbortSignal): RequestContext {
  return { user: { org_id: args.org_id, user_id: args.user_id }, signal };
}

/** Runs one tool call against the service. Never throws. */
export function handleToolCall(
  service: LibraryPanelService,
  name: string,
  args: Record<string, unknown> | undefined,
  signal?: AbortSignal
): ToolResult {
  const input = args ?? {};
  debug('mcp', 'Tool call', { name });

  try {
    switch (name) {
      case 'create_library_panel': {
        const a = argSchemas.create_library_panel.parse(input);
        const panel = service.createLibraryPanel(contextOf(a, signal), {
          folder_id: a.folder_id,
          name: a.name,
          model: a.model,
        });
        return json(panel);
      }

      case 'get_library_panel': {
        const a = argSchemas.get_library_panel.parse(input);
        return json(service.getLibraryPanel(contextOf(a, signal), a.uid));
      }

      case 'list_library_panels': {
        const a = argSchemas.list_library_panels.parse(input);
        return json(service.getAllLibraryPanels(contextOf(a, signal)));
      }

      case 'patch_library_panel': {
        const a = argSchemas.patch_library_panel.parse(input);
        const panel = service.patchLibraryPanel(contextOf(a, signal), a.uid, {
          folder_id: a.folder_id,
          name: a.name,
          model: a.model,
        });
        return json(panel);
      }

      case 'delete_library_panel': {
        const a = argSchemas.delete_library_panel.parse(input);
        service.deleteLibraryPanel(contextOf(a, signal), a.uid);
        return text(`Deleted library panel ${a.uid}`);
      }

      case 'connect_dashboard': {
        const a = argSchemas.connect_dashboard.parse(input);
        service.connectDashboard(contextOf(a, signal), a.uid, a.dashboard_id);
        return text(`Connected library panel ${a.uid} to dashboard ${a.dashboard_id}`);
      }

      case 'disconnect_dashboard': {
        const a = argSchemas.disconnect_dashboard.parse(input);
        service.disconnectDashboard(contextOf(a, signal), a.uid, a.dashboard_id);
        return text(`Disconnected library panel ${a.uid} from dashboard ${a.dashboard_id}`);
      }

      case 'list_connected_dashboards': {
        const a = argSchemas.list_connected_dashboards.parse(input);
        return json(service.getConnectedDashboards(contextOf(a, signal), a.uid));
      }

      default:
        return failure(`Unknown tool name: ${name}`);
    }
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      return failure(`Invalid arguments: ${issues.join('; ')}`);
    }
    if (error instanceof LibraryPanelError) {
      return failure(error.message);
    }
    logger.error('Tool call failed:', { name, error });
    return failure(`Error: ${error instanceof Error ? error.message : String(error)}`);
  }
}
