// Support Session Orchestrator - OpenAI client surface
// Minimal interface for the chat completions API the adapters use, so tests
// inject a stub and production passes the `openai` SDK client.

export interface OpenAIClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: "system" | "user" | "assistant"; content: string }>;
        response_format?: { type: "json_object" };
        temperature?: number;
      }): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

/**
 * One JSON-mode completion, parsed to an object.
 * @throws Error on an empty, non-JSON or non-object response.
 */
export async function completeJson(
  client: OpenAIClient,
  model: string,
  prompt: { system: string; user: string },
  temperature: number,
): Promise<Record<string, unknown>> {
  const response = await client.chat.completions.create({
    model,
    messages: [
      { role: "system", content: prompt.system },
      { role: "user", content: prompt.user },
    ],
    response_format: { type: "json_object" },
    temperature,
  });

  const content = response.choices[0]?.message?.content;
  if (!content) {
    throw new Error("LLM returned empty response");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    // Response text is never echoed: it may quote the user
    throw new Error("Failed to parse LLM response as JSON");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("LLM response is not a JSON object");
  }
  return { ...parsed };
}
