import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { QueryRouting } from "../domain/pipeline.js";

export function registerRouteQueryTool(server: McpServer, router: QueryRouting) {
  server.registerTool(
    "route_query",
    {
      title: "Route Query",
      description: "Shows which source policy (local, web or hybrid) a question would be routed to.",
      inputSchema: {
        question: z.string().min(1).describe("Natural-language question"),
      },
    },
    async ({ question }, extra) => {
      const decision = await router.route(question, { signal: extra.signal });
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(decision, null, 2),
          },
        ],
      };
    },
  );
}
