// OpenAI embeddings behind the Embedder contract
import OpenAI from 'openai';
import type { Embedder, Embedding } from '@/services/providers/retrieval-vector-utils';

export class OpenAIEmbedder implements Embedder {
  private client: OpenAI | null = null;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly model: string = 'text-embedding-3-small',
  ) {}

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.apiKey) {
        throw new Error('Missing OPENAI_API_KEY. Set it in .env or use EMBEDDER=simple.');
      }
      this.client = new OpenAI({ apiKey: this.apiKey });
    }
    return this.client;
  }

  async embed(text: string): Promise<Embedding> {
    const res = await this.getClient().embeddings.create({ model: this.model, input: text });
    return res.data[0]?.embedding ?? [];
  }
}
