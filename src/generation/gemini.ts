/**
 * Gemini-backed collaborators: Gemini for captions, Imagen for images,
 * both through @google/genai with the same API key.
 */

import { GoogleGenAI } from "@google/genai";
import type {
  GenerateContentParameters,
  GenerateImagesParameters,
  GeneratedImage,
  GetModelParameters,
} from "@google/genai";
import type { ImageModel } from "../contracts";
import { ConfigError } from "../config";
import type { CampaignConfig } from "../config";
import { IMAGE_MODEL_IDS } from "../pricing/priceTable";
import type {
  ImageGenerationRequest,
  ImageGenerationService,
  ImageServiceResult,
  TextGenerationRequest,
  TextGenerationResponse,
  TextGenerationService,
} from "./services";

/** The part of the GoogleGenAI client these services call. */
export interface GenAiClient {
  models: {
    generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
    generateImages(params: GenerateImagesParameters): Promise<{ generatedImages?: GeneratedImage[] }>;
    get(params: GetModelParameters): Promise<unknown>;
  };
}

export class GeminiTextService implements TextGenerationService {
  constructor(
    private readonly ai: GenAiClient,
    readonly model: string
  ) {}

  async generateText(request: TextGenerationRequest): Promise<TextGenerationResponse> {
    const response = await this.ai.models.generateContent({
      model: this.model,
      contents: request.prompt,
      config: {
        systemInstruction: request.systemInstruction,
        responseMimeType: "application/json",
        temperature: 0.8,
        abortSignal: request.signal,
      },
    });

    const text = response.text;
    if (!text) {
      throw new Error("Empty response from text model");
    }
    return { text };
  }

  async ping(signal: AbortSignal): Promise<void> {
    await this.ai.models.get({ model: this.model, config: { abortSignal: signal } });
  }
}

export class GeminiImageService implements ImageGenerationService {
  constructor(
    private readonly ai: GenAiClient,
    readonly model: ImageModel
  ) {}

  async generateImage(request: ImageGenerationRequest): Promise<ImageServiceResult> {
    const response = await this.ai.models.generateImages({
      model: IMAGE_MODEL_IDS[this.model],
      prompt: request.prompt,
      config: {
        numberOfImages: 1,
        aspectRatio: request.aspectRatio,
        imageSize: request.imageSize,
        includeRaiReason: true,
        abortSignal: request.signal,
      },
    });

    const generated = response.generatedImages?.[0];
    const imageBytes = generated?.image?.imageBytes;
    if (!imageBytes) {
      const reason = generated?.raiFilteredReason;
      if (!reason) {
        throw new Error("Image model returned no image and no filter reason");
      }
      return { status: "filtered", reason };
    }

    return {
      status: "ok",
      data: Buffer.from(imageBytes, "base64"),
      mimeType: generated?.image?.mimeType ?? "image/png",
    };
  }

  async ping(signal: AbortSignal): Promise<void> {
    await this.ai.models.get({ model: IMAGE_MODEL_IDS[this.model], config: { abortSignal: signal } });
  }
}

export interface GenerationServices {
  text: TextGenerationService;
  image: ImageGenerationService;
}

/**
 * Build the production collaborators. A missing API key is a startup
 * configuration error, not a per-request failure.
 */
export function createGeminiServices(config: CampaignConfig): GenerationServices {
  if (!config.geminiApiKey) {
    throw new ConfigError(config.configErrors.join(" ") || "GEMINI_API_KEY is not set.");
  }
  const ai = new GoogleGenAI({ apiKey: config.geminiApiKey });
  return {
    text: new GeminiTextService(ai, config.textModel),
    image: new GeminiImageService(ai, config.imageModel),
  };
}
