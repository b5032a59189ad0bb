/**
 * Content Store
 *
 * The publishable material scheduled posts point at: platform-ready social
 * posts, long-form articles and standalone posts. Only what the scheduler
 * needs lives here: create, read, resolve to text and mark used.
 */

import { nanoid } from 'nanoid';
import type { ContentRef, ContentResolver, Platform, ResolvedContent, UsageMarker } from '../types.js';
import { toLocalTimestamp } from '../clock.js';
import type { SqliteDatabase } from './database.js';

/** Articles are published as topic + body, cut to stay under LinkedIn's post cap. */
export const ARTICLE_EXCERPT_LENGTH = 2800;

type PostRow = {
  id: string;
  platform: string | null;
  content: string;
  image_url: string | null;
  used: number;
  created_at: string;
};

type ArticleRow = {
  id: string;
  topic: string;
  content: string;
  used: number;
  created_at: string;
};

export interface StoredPost {
  id: string;
  platform?: Platform;
  content: string;
  imageUrl?: string;
  used: boolean;
  createdAt: string;
}

export interface StoredArticle {
  id: string;
  topic: string;
  content: string;
  used: boolean;
  createdAt: string;
}

export interface NewPostInput {
  content: string;
  platform?: Platform;
  imageUrl?: string;
}

type PostTable = 'social_posts' | 'standalone_posts';

export class ContentStore implements ContentResolver, UsageMarker {
  constructor(private db: SqliteDatabase, private now: () => Date = () => new Date()) {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS social_posts (
        id TEXT PRIMARY KEY,
        platform TEXT,
        content TEXT NOT NULL,
        image_url TEXT,
        used INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS standalone_posts (
        id TEXT PRIMARY KEY,
        platform TEXT,
        content TEXT NOT NULL,
        image_url TEXT,
        used INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS articles (
        id TEXT PRIMARY KEY,
        topic TEXT NOT NULL,
        content TEXT NOT NULL,
        used INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL
      );
    `);
  }

  addSocialPost(input: NewPostInput): StoredPost {
    return this.insertPost('social_posts', `soc_${nanoid(10)}`, input);
  }

  addStandalonePost(input: NewPostInput): StoredPost {
    return this.insertPost('standalone_posts', `std_${nanoid(10)}`, input);
  }

  addArticle(input: { topic: string; content: string }): StoredArticle {
    const article: StoredArticle = {
      id: `art_${nanoid(10)}`,
      topic: input.topic,
      content: input.content,
      used: false,
      createdAt: toLocalTimestamp(this.now()),
    };
    this.db.prepare(`
      INSERT INTO articles (id, topic, content, used, created_at) VALUES (?, ?, ?, 0, ?)
    `).run(article.id, article.topic, article.content, article.createdAt);
    return article;
  }

  getSocialPost(id: string): StoredPost | undefined {
    return this.getPost('social_posts', id);
  }

  getStandalonePost(id: string): StoredPost | undefined {
    return this.getPost('standalone_posts', id);
  }

  getArticle(id: string): StoredArticle | undefined {
    const row = this.db.prepare('SELECT * FROM articles WHERE id = ?').get(id) as ArticleRow | undefined;
    if (!row) return undefined;
    return { id: row.id, topic: row.topic, content: row.content, used: row.used === 1, createdAt: row.created_at };
  }

  listStandalonePosts(): StoredPost[] {
    const rows = this.db.prepare('SELECT * FROM standalone_posts ORDER BY created_at DESC, rowid DESC').all() as PostRow[];
    return rows.map(row => this.rowToPost(row));
  }

  resolveContent(ref: ContentRef): ResolvedContent | null {
    switch (ref.kind) {
      case 'social':
        return this.resolvePost(this.getSocialPost(ref.socialPostId));
      case 'standalone':
        return this.resolvePost(this.getStandalonePost(ref.standalonePostId));
      case 'article': {
        const article = this.getArticle(ref.articleId);
        if (!article) return null;
        return {
          text: `${article.topic}\n\n${article.content.slice(0, ARTICLE_EXCERPT_LENGTH)}`,
          title: article.topic,
        };
      }
    }
  }

  markUsed(ref: ContentRef): void {
    switch (ref.kind) {
      case 'social':
        this.db.prepare('UPDATE social_posts SET used = 1 WHERE id = ?').run(ref.socialPostId);
        return;
      case 'standalone':
        this.db.prepare('UPDATE standalone_posts SET used = 1 WHERE id = ?').run(ref.standalonePostId);
        return;
      case 'article':
        this.db.prepare('UPDATE articles SET used = 1 WHERE id = ?').run(ref.articleId);
        return;
    }
  }

  private resolvePost(post: StoredPost | undefined): ResolvedContent | null {
    if (!post) return null;
    return post.imageUrl ? { text: post.content, imageUrl: post.imageUrl } : { text: post.content };
  }

  private insertPost(table: PostTable, id: string, input: NewPostInput): StoredPost {
    const createdAt = toLocalTimestamp(this.now());
    this.db.prepare(`
      INSERT INTO ${table} (id, platform, content, image_url, used, created_at) VALUES (?, ?, ?, ?, 0, ?)
    `).run(id, input.platform ?? null, input.content, input.imageUrl ?? null, createdAt);
    const post = this.getPost(table, id);
    if (!post) throw new Error(`Post ${id} not found after insert`);
    return post;
  }

  private getPost(table: PostTable, id: string): StoredPost | undefined {
    const row = this.db.prepare(`SELECT * FROM ${table} WHERE id = ?`).get(id) as PostRow | undefined;
    return row ? this.rowToPost(row) : undefined;
  }

  private rowToPost(row: PostRow): StoredPost {
    const post: StoredPost = {
      id: row.id,
      content: row.content,
      used: row.used === 1,
      createdAt: row.created_at,
    };
    if (row.platform === 'linkedin' || row.platform === 'threads') post.platform = row.platform;
    if (row.image_url) post.imageUrl = row.image_url;
    return post;
  }
}
