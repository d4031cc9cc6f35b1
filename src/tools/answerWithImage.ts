import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { AgentError } from "../domain/errors.js";
import { ImageQuestionAnswering } from "../domain/pipeline.js";

export function registerAnswerWithImageTool(server: McpServer, answerer: ImageQuestionAnswering) {
  server.registerTool(
    "answer_with_image",
    {
      title: "Answer With Image",
      description: "Answers a question about an image (PNG, JPEG, GIF or WebP) with a vision model.",
      inputSchema: {
        question: z.string().min(1).describe("Question about the image"),
        image_base64: z.string().min(1).describe("Base64 image bytes or a data: URL"),
      },
    },
    async ({ question, image_base64 }, extra) => {
      try {
        const answer = await answerer.answerWithImage(
          { query: question, imageBase64: image_base64 },
          { signal: extra.signal },
        );
        return {
          content: [
            {
              type: "text",
              text: JSON.stringify(answer, null, 2),
            },
          ],
        };
      } catch (error) {
        if (!(error instanceof AgentError)) {
          throw error;
        }
        return {
          isError: true,
          content: [
            {
              type: "text",
              text: error.message,
            },
          ],
        };
      }
    },
  );
}
