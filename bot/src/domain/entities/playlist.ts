import type { RepeatMode } from '../value-objects/repeat-mode.js';

/**
 * Playlist Entity
 * Ordered tracks with a cursor and a repeat mode. The cursor is -1 exactly
 * when the playlist is empty. Advancing past the end with repeat `off`
 * leaves the cursor at `length` ("exhausted"), where current() is undefined.
 */
export class Playlist<T> {
  private _items: T[] = [];
  private _position = -1;

  constructor(private _repeat: RepeatMode = 'off') {}

  get length(): number {
    return this._items.length;
  }

  get position(): number {
    return this._position;
  }

  get repeat(): RepeatMode {
    return this._repeat;
  }

  get items(): readonly T[] {
    return this._items;
  }

  isEmpty(): boolean {
    return this._items.length === 0;
  }

  isExhausted(): boolean {
    return this._items.length > 0 && this._position >= this._items.length;
  }

  current(): T | undefined {
    if (this._position < 0 || this._position >= this._items.length) {
      return undefined;
    }
    return this._items[this._position];
  }

  get(index: number): T | undefined {
    return this._items[index];
  }

  indexOf(item: T): number {
    return this._items.indexOf(item);
  }

  /**
   * Append items in order. Returns the zero-based index of the first added item.
   */
  add(items: readonly T[]): number {
    const start = this._items.length;
    this._items.push(...items);

    if (start === 0 && this._items.length > 0) {
      this._position = 0;
    }
    return start;
  }

  /**
   * Remove the item at a zero-based index. Removing at or before the cursor
   * moves the cursor back by one, never below 0 while items remain.
   */
  remove(index: number): T | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this._items.length) {
      return undefined;
    }

    const [removed] = this._items.splice(index, 1);

    if (this._items.length === 0) {
      this._position = -1;
    } else if (index <= this._position) {
      this._position = Math.max(0, this._position - 1);
    }
    return removed;
  }

  clear(): void {
    this._items = [];
    this._position = -1;
  }

  /**
   * Shuffle in place. The item under the cursor stays at the cursor index.
   */
  shuffle(random: () => number = Math.random): void {
    const current = this.current();

    for (let i = this._items.length - 1; i > 0; i--) {
      const j = Math.floor(random() * (i + 1));
      const a = this._items[i];
      const b = this._items[j];
      if (a === undefined || b === undefined) continue;
      this._items[i] = b;
      this._items[j] = a;
    }

    if (current === undefined) {
      return;
    }

    const moved = this._items.indexOf(current);
    const displaced = this._items[this._position];
    if (moved !== this._position && moved >= 0 && displaced !== undefined) {
      this._items[moved] = displaced;
      this._items[this._position] = current;
    }
  }

  setRepeat(mode: RepeatMode): void {
    this._repeat = mode;
  }

  /**
   * Move the cursor, clamped into the playlist. Returns the item now under
   * the cursor, or undefined for an empty playlist.
   */
  setPosition(index: number): T | undefined {
    if (this.isEmpty()) {
      return undefined;
    }
    this._position = Math.min(Math.max(Math.trunc(index), 0), this._items.length - 1);
    return this.current();
  }

  hasNext(): boolean {
    if (this.isEmpty()) {
      return false;
    }
    if (this._repeat !== 'off') {
      return true;
    }
    return this._position + 1 < this._items.length;
  }

  /**
   * Move the cursor according to the repeat mode and return the item under it.
   */
  advance(): T | undefined {
    if (this.isEmpty()) {
      return undefined;
    }

    if (this.isExhausted() && this._repeat !== 'off') {
      this._position = 0;
      return this.current();
    }

    switch (this._repeat) {
      case 'off':
        this._position = Math.min(this._position + 1, this._items.length);
        break;
      case 'track':
        break;
      case 'all':
        this._position = (this._position + 1) % this._items.length;
        break;
    }
    return this.current();
  }
}
