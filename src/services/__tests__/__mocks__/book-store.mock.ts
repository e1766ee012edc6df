/**
 * Book Store Mock Utilities
 *
 * In-memory BookStore with save counting and injectable save failures.
 */

import type { Book, CoverRecord } from '../../../types/cover.types.js';
import type { BookStore } from '../../book-store.service.js';
import { cloneBook } from '../../book-store.service.js';

export class InMemoryBookStore implements BookStore {
  private readonly books = new Map<string, Book>();
  saves = 0;
  /** Number of upcoming save() calls that should fail */
  failNextSaves = 0;

  constructor(books: Book[] = []) {
    for (const book of books) {
      this.books.set(book.id, cloneBook(book));
    }
  }

  async fetchAll(): Promise<Book[]> {
    return Array.from(this.books.values(), cloneBook);
  }

  async fetchWhere(predicate: (book: Book) => boolean): Promise<Book[]> {
    return Array.from(this.books.values()).filter(predicate).map(cloneBook);
  }

  async fetchById(id: string): Promise<Book | null> {
    const book = this.books.get(id);
    return book ? cloneBook(book) : null;
  }

  async save(book: Book): Promise<void> {
    this.saves++;
    if (this.failNextSaves > 0) {
      this.failNextSaves--;
      throw new Error('disk full');
    }
    this.books.set(book.id, cloneBook(book));
  }

  async delete(id: string): Promise<boolean> {
    return this.books.delete(id);
  }

  /** Stored copy without cloning, for assertions */
  peek(id: string): Book | undefined {
    return this.books.get(id);
  }
}

export function createTestBook(id: string, cover: Partial<CoverRecord> = {}): Book {
  return {
    id,
    title: `Book ${id}`,
    author: 'Test Author',
    createdAt: new Date('2024-01-15T10:00:00.000Z'),
    cover: {
      candidateURLs: [],
      ...cover,
    },
  };
}
