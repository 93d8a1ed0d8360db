/**
 * Core query tools - Shared logic for the CLI and the MCP server
 *
 * Usage:
 *   import { filterQuery, filterQuerySchema } from "./tools/core";
 */

export {
  filterQuery,
  filterQuerySchema,
  filterQueryDescription,
  type FilterQueryInput,
} from "./filter-query";

export {
  agentQuery,
  agentQuerySchema,
  agentQueryDescription,
  type AgentQueryInput,
} from "./agent-query";

export {
  healthCheck,
  healthCheckSchema,
  healthCheckDescription,
  type HealthCheckInput,
} from "./health-check";
