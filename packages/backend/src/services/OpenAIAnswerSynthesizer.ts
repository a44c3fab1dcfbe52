import OpenAI from "openai";
import type { AppConfig } from "../config.js";
import { buildAnswerSystemPrompt } from "../prompts/answer.js";
import { UpstreamError } from "../errors/AppError.js";
import { linkAbortSignals, raceAbort } from "../utils/abort.js";
import type {
  AnswerRequest,
  AnswerSynthesizer,
  ChatCompletionClient
} from "./embeddingTypes.js";

export interface AnswerSynthesizerConfig {
  apiKey: string;
  baseURL: string;
  model: string;
  timeoutMs: number;
  temperature?: number;
  maxTokens?: number;
}

export function createOpenAIChatClient(apiKey: string, baseURL: string): ChatCompletionClient {
  const openai = new OpenAI({ apiKey, baseURL });
  return {
    async complete(request, signal) {
      const completion = await openai.chat.completions.create(
        {
          model: request.model,
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          messages: [
            { role: "system", content: request.systemPrompt },
            { role: "user", content: request.userPrompt }
          ]
        },
        { signal }
      );
      return completion.choices[0]?.message.content ?? null;
    }
  };
}

export class OpenAIAnswerSynthesizer implements AnswerSynthesizer {
  private readonly client: ChatCompletionClient;

  constructor(
    private readonly config: AnswerSynthesizerConfig,
    deps?: { client?: ChatCompletionClient }
  ) {
    this.client = deps?.client ?? createOpenAIChatClient(config.apiKey, config.baseURL);
  }

  static fromConfig(config: AppConfig): OpenAIAnswerSynthesizer {
    return new OpenAIAnswerSynthesizer({
      apiKey: config.ANSWER_API_KEY,
      baseURL: config.ANSWER_BASE_URL,
      model: config.ANSWER_MODEL,
      timeoutMs: config.ANSWER_TIMEOUT_MS
    });
  }

  async synthesize(request: AnswerRequest, options: { signal?: AbortSignal } = {}): Promise<string> {
    const linked = linkAbortSignals([options.signal], this.config.timeoutMs);
    try {
      const content = await raceAbort(
        this.client.complete(
          {
            model: this.config.model,
            temperature: this.config.temperature ?? 0.1,
            maxTokens: this.config.maxTokens ?? 1024,
            systemPrompt: buildAnswerSystemPrompt(request.chunks),
            userPrompt: request.query
          },
          linked.signal
        ),
        linked.signal
      );

      const answer = content?.trim() ?? "";
      if (answer.length === 0) {
        throw new UpstreamError("Answer model returned an empty completion");
      }
      return answer;
    } finally {
      linked.dispose();
    }
  }
}
