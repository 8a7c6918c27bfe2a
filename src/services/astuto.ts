/**
 * Astuto API Integration Service
 * Lists and creates posts on a feedback board
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { AstutoPost, CreatePostInput, CreatedPost, PostDestination } from '../types';

const postSchema = z.object({
  id: z.coerce.number().int(),
  title: z.string(),
  description: z.string().nullable().optional(),
  board_id: z.coerce.number().int().optional(),
});

const postListSchema = z.array(postSchema);

export interface AstutoServiceOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  /** Replaces axios' HTTP adapter; tests use it to answer in process. */
  adapter?: AxiosAdapter;
}

export class AstutoService implements PostDestination {
  private http: AxiosInstance;

  constructor(options: AstutoServiceOptions) {
    this.http = axios.create({
      baseURL: `${options.baseUrl.replace(/\/+$/, '')}/api/v1`,
      headers: {
        'Authorization': `Bearer ${options.apiKey}`,
        'Content-Type': 'application/json',
        'Accept': 'application/json',
      },
      timeout: options.timeoutMs ?? 30000,
      adapter: options.adapter,
    });
  }

  /**
   * List every post of a board, following pages until one brings nothing new
   */
  async listPosts(boardId: number): Promise<AstutoPost[]> {
    const posts: AstutoPost[] = [];
    const seen = new Set<number>();

    for (let page = 1; ; page++) {
      const response = await this.http.get('/posts', {
        params: { board_id: boardId, page },
      });

      const batch = postListSchema.parse(response.data);
      const fresh = batch.filter(post => !seen.has(post.id));
      // Also guards against a server that ignores `page` and repeats itself
      if (fresh.length === 0) return posts;

      for (const post of fresh) {
        seen.add(post.id);
        if (post.board_id === undefined || post.board_id === boardId) {
          posts.push(post);
        }
      }
    }
  }

  /**
   * Create a post on a board
   */
  async createPost(input: CreatePostInput): Promise<CreatedPost> {
    const response = await this.http.post('/posts', {
      title: input.title,
      description: input.description,
      board_id: input.boardId,
      status: input.status,
    });

    const created = postSchema.pick({ id: true }).safeParse(response.data);
    return created.success ? { id: created.data.id } : {};
  }
}
