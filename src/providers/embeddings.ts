import { voyage } from 'voyage-ai-provider'
import { embed, embedMany } from 'ai'

export interface Embedder {
  embed(text: string): Promise<number[]>
  embedMany(texts: string[]): Promise<number[][]>
}

export function createVoyageEmbedder(model: string = 'voyage-3'): Embedder {
  const embeddingModel = voyage.textEmbeddingModel(model)

  return {
    async embed(text) {
      const result = await embed({ model: embeddingModel, value: text })
      return result.embedding
    },
    async embedMany(texts) {
      if (texts.length === 0) return []
      const result = await embedMany({ model: embeddingModel, values: texts })
      return result.embeddings
    }
  }
}
