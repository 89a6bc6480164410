/**
 * VisionSummarizer.ts
 * Sends a cropped page region to a vision model and returns its text.
 */
import { config, Config } from '../config';
import { ChatCompletionClient, ChatContentPart, HttpPoster } from '../utils/ChatCompletionClient';
import { bufferToBase64 } from '../utils/fileUtils';
import { chartSystemPrompt, pageContextLabel, tableSystemPrompt } from '../prompts/visionPrompts';

/**
 * What the enhancer needs from a vision model
 */
export interface RegionSummarizer {
  summarizeChart(image: Buffer, contextText?: string): Promise<string>;
  summarizeTable(image: Buffer, contextText?: string): Promise<string>;
}

export class VisionSummarizer implements RegionSummarizer {
  private client: ChatCompletionClient;
  private model: string;
  private maxTokens: number;

  constructor(settings: Config = config, http?: HttpPoster) {
    this.model = settings.vlm.model;
    this.maxTokens = settings.vlm.maxTokens;
    this.client = new ChatCompletionClient(
      {
        apiKey: settings.llm.apiKey,
        baseUrl: settings.llm.baseUrl,
        timeout: settings.vlm.timeout,
        service: 'vlm',
      },
      http
    );
  }

  /**
   * One request, no retry. Any non-2xx answer raises VlmApiError.
   */
  async summarize(image: Buffer, systemPrompt: string, contextText?: string): Promise<string> {
    const content: ChatContentPart[] = [
      { type: 'image_url', image_url: { url: bufferToBase64(image, 'image/png') } },
    ];
    if (contextText) {
      content.push({ type: 'text', text: `${pageContextLabel}\n${contextText}` });
    }

    const completion = await this.client.complete({
      model: this.model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content },
      ],
      maxTokens: this.maxTokens,
      temperature: 0,
    });

    return completion.content.trim();
  }

  summarizeChart(image: Buffer, contextText?: string): Promise<string> {
    return this.summarize(image, chartSystemPrompt, contextText);
  }

  summarizeTable(image: Buffer, contextText?: string): Promise<string> {
    return this.summarize(image, tableSystemPrompt, contextText);
  }
}
