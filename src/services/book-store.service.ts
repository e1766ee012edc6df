/**
 * Book Store Service
 *
 * Persistent store for library books and their embedded cover records.
 * The cover pipeline only talks to the BookStore interface; JsonFileBookStore
 * keeps the whole library in one JSON document under the app data directory.
 *
 * Fetches return copies: changing a returned book has no effect until it is
 * passed back to save().
 */

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { randomUUID } from 'crypto';
import { dirname } from 'path';
import { z } from 'zod';
import { storeLogger as logger } from './logger.service.js';
import { CoverError } from '../types/errors.js';
import type { Book, CoverRecord } from '../types/cover.types.js';

// =============================================================================
// Interface
// =============================================================================

export interface BookStore {
  fetchAll(): Promise<Book[]>;
  fetchWhere(predicate: (book: Book) => boolean): Promise<Book[]>;
  fetchById(id: string): Promise<Book | null>;
  /** Insert or replace by id */
  save(book: Book): Promise<void>;
  /** Returns false when no book had the id */
  delete(id: string): Promise<boolean>;
}

// =============================================================================
// Helpers
// =============================================================================

export function cloneCoverRecord(cover: CoverRecord): CoverRecord {
  return {
    ...cover,
    candidateURLs: [...cover.candidateURLs],
    syncedThumbnail: cover.syncedThumbnail ? Buffer.from(cover.syncedThumbnail) : undefined,
  };
}

export function cloneBook(book: Book): Book {
  return {
    ...book,
    createdAt: new Date(book.createdAt.getTime()),
    cover: cloneCoverRecord(book.cover),
  };
}

// =============================================================================
// Stored Format
// =============================================================================

const STORE_VERSION = 1;

const StoredCoverSchema = z.object({
  primaryCoverURL: z.string().optional(),
  candidateURLs: z.array(z.string()).default([]),
  userPhotoFileRef: z.string().optional(),
  /** base64 JPEG */
  syncedThumbnail: z.string().optional(),
});

const StoredBookSchema = z
  .object({
    id: z.string().min(1),
    title: z.string(),
    author: z.string().default(''),
    isbn13: z.string().optional(),
    createdAt: z.coerce.date(),
    cover: StoredCoverSchema.default({}),
  })
  .passthrough();

const StoredLibrarySchema = z.object({
  version: z.number().int(),
  books: z.array(StoredBookSchema),
});

type StoredBook = z.infer<typeof StoredBookSchema>;

const KNOWN_FIELDS = new Set(['id', 'title', 'author', 'isbn13', 'createdAt', 'cover']);

function splitStoredBook(stored: StoredBook): { book: Book; extra: Record<string, unknown> } {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(stored)) {
    if (!KNOWN_FIELDS.has(key)) extra[key] = value;
  }

  const thumbnail = stored.cover.syncedThumbnail;
  return {
    book: {
      id: stored.id,
      title: stored.title,
      author: stored.author,
      isbn13: stored.isbn13,
      createdAt: stored.createdAt,
      cover: {
        primaryCoverURL: stored.cover.primaryCoverURL,
        candidateURLs: stored.cover.candidateURLs,
        userPhotoFileRef: stored.cover.userPhotoFileRef,
        syncedThumbnail: thumbnail ? Buffer.from(thumbnail, 'base64') : undefined,
      },
    },
    extra,
  };
}

function toStoredBook(book: Book, extra: Record<string, unknown> | undefined): Record<string, unknown> {
  return {
    ...extra,
    id: book.id,
    title: book.title,
    author: book.author,
    isbn13: book.isbn13,
    createdAt: book.createdAt.toISOString(),
    cover: {
      primaryCoverURL: book.cover.primaryCoverURL,
      candidateURLs: book.cover.candidateURLs,
      userPhotoFileRef: book.cover.userPhotoFileRef,
      syncedThumbnail: book.cover.syncedThumbnail?.toString('base64'),
    },
  };
}

// =============================================================================
// JSON File Store
// =============================================================================

export interface JsonFileBookStoreOptions {
  filePath: string;
}

export class JsonFileBookStore implements BookStore {
  private readonly filePath: string;
  private books: Map<string, Book> | null = null;
  /** Fields this subsystem does not interpret, written back untouched */
  private readonly extras = new Map<string, Record<string, unknown>>();
  private loading: Promise<Map<string, Book>> | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: JsonFileBookStoreOptions) {
    this.filePath = options.filePath;
  }

  async fetchAll(): Promise<Book[]> {
    const books = await this.load();
    return Array.from(books.values(), cloneBook);
  }

  async fetchWhere(predicate: (book: Book) => boolean): Promise<Book[]> {
    const books = await this.load();
    return Array.from(books.values()).filter(predicate).map(cloneBook);
  }

  async fetchById(id: string): Promise<Book | null> {
    const books = await this.load();
    const book = books.get(id);
    return book ? cloneBook(book) : null;
  }

  async save(book: Book): Promise<void> {
    const books = await this.load();
    books.set(book.id, cloneBook(book));
    await this.persist();
  }

  async delete(id: string): Promise<boolean> {
    const books = await this.load();
    if (!books.delete(id)) return false;
    this.extras.delete(id);
    await this.persist();
    return true;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private load(): Promise<Map<string, Book>> {
    if (this.books) return Promise.resolve(this.books);
    if (!this.loading) {
      this.loading = this.readFromDisk().then(
        (books) => {
          this.books = books;
          this.loading = null;
          return books;
        },
        (error: unknown) => {
          this.loading = null;
          throw error;
        }
      );
    }
    return this.loading;
  }

  private async readFromDisk(): Promise<Map<string, Book>> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        logger.info({ path: this.filePath }, 'No library file yet, starting empty');
        return new Map();
      }
      throw new CoverError('STORAGE_FAILED', `Failed to read library: ${String(error)}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new CoverError('STORAGE_FAILED', `Library file is not valid JSON: ${String(error)}`);
    }

    const result = StoredLibrarySchema.safeParse(json);
    if (!result.success) {
      throw new CoverError('STORAGE_FAILED', 'Library file has an unexpected shape', {
        issues: result.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
    }

    const books = new Map<string, Book>();
    for (const stored of result.data.books) {
      const { book, extra } = splitStoredBook(stored);
      books.set(book.id, book);
      if (Object.keys(extra).length > 0) {
        this.extras.set(book.id, extra);
      }
    }

    logger.debug({ path: this.filePath, books: books.size }, 'Library loaded');
    return books;
  }

  /**
   * Write the current snapshot. Writes are serialized; each one writes to a
   * temporary file and renames it over the library file.
   */
  private persist(): Promise<void> {
    const run = this.writeChain
      .catch(() => undefined)
      .then(() => this.writeSnapshot());
    this.writeChain = run;
    return run;
  }

  private async writeSnapshot(): Promise<void> {
    const books = this.books ?? new Map<string, Book>();
    const document = {
      version: STORE_VERSION,
      books: Array.from(books.values(), (book) => toStoredBook(book, this.extras.get(book.id))),
    };

    const temp = `${this.filePath}.${randomUUID()}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(temp, JSON.stringify(document, null, 2), 'utf-8');
      await rename(temp, this.filePath);
    } catch (error) {
      await rm(temp, { force: true });
      throw new CoverError('STORAGE_FAILED', `Failed to write library: ${String(error)}`);
    }
  }
}
