/**
 * INPUT: session + validated question / image
 * OUTPUT: ResolveResult, ImageAnalysisResult, status and reference content
 * POS: service layer, wires config + knowledge base + generation client into one pipeline for the API routes
 */

import { getConfig } from '../config/appConfig';
import { AssistantSession } from '../core/assistantSession';
import {
  GenerationStatus,
  ImageAnalysisResult,
  ImageInput,
  ReferenceCard,
  ResolveResult,
  TopicEntry,
} from '../models/assistant';
import { AnthropicGenerationClient, GenerationClient } from './generationClient';
import { accessibilityKnowledge } from './knowledgeBase';
import { ResolutionPipeline } from './resolutionPipeline';

export interface ResourceCatalog {
  topics: readonly TopicEntry[];
  referenceCards: readonly ReferenceCard[];
  examplePrompts: readonly string[];
}

let client: GenerationClient | null = null;
let pipeline: ResolutionPipeline | null = null;

function getClient(): GenerationClient {
  if (!client) {
    const { apiKey, modelName, generationTimeoutMs } = getConfig();
    client = new AnthropicGenerationClient({ apiKey, modelName, timeoutMs: generationTimeoutMs });
  }
  return client;
}

function getPipeline(): ResolutionPipeline {
  if (!pipeline) pipeline = new ResolutionPipeline(accessibilityKnowledge, getClient());
  return pipeline;
}

export async function askQuestion(session: AssistantSession, question: string): Promise<ResolveResult | null> {
  return getPipeline().resolve(session, question);
}

export async function analyzeImage(session: AssistantSession, image: ImageInput): Promise<ImageAnalysisResult> {
  return getPipeline().analyzeImage(session, image);
}

export function getImageGuidance(): string {
  return getPipeline().altTextGuidance();
}

export function getGenerationStatus(): GenerationStatus {
  const generation = getClient();
  if (!generation.isConfigured()) {
    return {
      configured: false,
      model: generation.modelName,
      message: 'API key not found: set ANTHROPIC_API_KEY to enable live answers and image analysis',
    };
  }
  return {
    configured: true,
    model: generation.modelName,
    message: 'API configured (cost-optimized: cached, rate-limited, offline-first)',
  };
}

export function listResources(): ResourceCatalog {
  return {
    topics: accessibilityKnowledge.listTopics(),
    referenceCards: accessibilityKnowledge.getReferenceCards(),
    examplePrompts: accessibilityKnowledge.getExamplePrompts(),
  };
}
