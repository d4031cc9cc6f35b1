import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { AnswerOrchestrator } from "../services/answerOrchestrator.js";

export function registerAnswerQuestionTool(server: McpServer, orchestrator: AnswerOrchestrator) {
  server.registerTool(
    "answer_question",
    {
      title: "Answer Question",
      description:
        "Routes a question to the local knowledge base, web search or both, and returns a cited answer.",
      inputSchema: {
        question: z.string().min(1).describe("Natural-language question"),
      },
    },
    async ({ question }, extra) => {
      const response = await orchestrator.answer(question, { signal: extra.signal });
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(response, null, 2),
          },
        ],
      };
    },
  );
}
