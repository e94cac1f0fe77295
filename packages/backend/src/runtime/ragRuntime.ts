import type { VectorIndex } from "@lorebase/shared";
import { appConfig } from "../config.js";
import { IndexingPipeline } from "../pipeline/IndexingPipeline.js";
import { AnswerService } from "../services/AnswerService.js";
import { EmbeddingGateway } from "../services/EmbeddingGateway.js";
import { Generator } from "../services/Generator.js";
import type { EmbeddingGatewayLike, GeneratorLike } from "../services/llmTypes.js";
import { Retriever } from "../services/Retriever.js";
import { SessionStore } from "../services/SessionStore.js";
import { SqliteVectorIndex } from "../store/SqliteVectorIndex.js";
import { KeyedMutex } from "../utils/KeyedMutex.js";

let vectorIndexSingleton: VectorIndex | null = null;
let embeddingGatewaySingleton: EmbeddingGatewayLike | null = null;
let generatorSingleton: GeneratorLike | null = null;
let sessionStoreSingleton: SessionStore | null = null;
let documentMutexSingleton: KeyedMutex | null = null;
let retrieverSingleton: Retriever | null = null;
let answerServiceSingleton: AnswerService | null = null;
let indexingPipelineSingleton: IndexingPipeline | null = null;

export function getVectorIndexSingleton(): VectorIndex {
  if (!vectorIndexSingleton) {
    vectorIndexSingleton = new SqliteVectorIndex();
  }

  return vectorIndexSingleton;
}

export function getEmbeddingGatewaySingleton(): EmbeddingGatewayLike {
  if (!embeddingGatewaySingleton) {
    embeddingGatewaySingleton = EmbeddingGateway.fromEnv();
  }

  return embeddingGatewaySingleton;
}

export function getGeneratorSingleton(): GeneratorLike {
  if (!generatorSingleton) {
    generatorSingleton = Generator.fromEnv();
  }

  return generatorSingleton;
}

export function getSessionStoreSingleton(): SessionStore {
  if (!sessionStoreSingleton) {
    sessionStoreSingleton = new SessionStore({ maxTurns: appConfig.MAX_CONVERSATION_TURNS });
  }

  return sessionStoreSingleton;
}

/** Per-document write lock shared by indexing runs and deletes. */
export function getDocumentMutexSingleton(): KeyedMutex {
  if (!documentMutexSingleton) {
    documentMutexSingleton = new KeyedMutex();
  }

  return documentMutexSingleton;
}

export function getRetrieverSingleton(): Retriever {
  if (!retrieverSingleton) {
    retrieverSingleton = new Retriever(getVectorIndexSingleton(), getEmbeddingGatewaySingleton(), {
      generator: getGeneratorSingleton()
    });
  }

  return retrieverSingleton;
}

export function getAnswerServiceSingleton(): AnswerService {
  if (!answerServiceSingleton) {
    answerServiceSingleton = new AnswerService(getRetrieverSingleton(), getGeneratorSingleton());
  }

  return answerServiceSingleton;
}

export function getIndexingPipelineSingleton(): IndexingPipeline {
  if (!indexingPipelineSingleton) {
    indexingPipelineSingleton = new IndexingPipeline(
      getVectorIndexSingleton(),
      getEmbeddingGatewaySingleton(),
      { mutex: getDocumentMutexSingleton() }
    );
  }

  return indexingPipelineSingleton;
}

export async function closeRuntime(): Promise<void> {
  sessionStoreSingleton?.close();
  const index = vectorIndexSingleton;
  vectorIndexSingleton = null;
  retrieverSingleton = null;
  answerServiceSingleton = null;
  indexingPipelineSingleton = null;
  if (index) {
    await index.close();
  }
}
