import { describe, expect, test } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TextBuffer, splitLines } from '../core/buffer/text-buffer';
import { Line } from '../core/buffer/line';
import { Cursor } from '../core/cursor/cursor';
import { FileStorage, MemoryStorage } from '../core/storage/storage';
import { StorageError } from '../core/storage/errors';
import { createTokenizer } from '../core/tokenizer/language-modes';

function contents(buf: TextBuffer): string[] {
  return buf.lines.map(l => l.content);
}

function makeBuffer(text: string) {
  const storage = new MemoryStorage();
  const buf = TextBuffer.fromText(text, { storage, tokenizer: createTokenizer('rust') });
  const cursor = new Cursor({ width: 80, height: 24 });
  return { buf, cursor, storage };
}

function assertTagsAligned(buf: TextBuffer): void {
  for (const line of buf.lines) {
    expect(line.tags.length).toBe(line.content.length);
  }
}

describe('splitLines', () => {
  test('empty input is one blank line', () => {
    expect(splitLines('')).toEqual(['']);
  });

  test('trailing newline does not add a line', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
  });

  test('keeps inner blank lines', () => {
    expect(splitLines('a\n\nb')).toEqual(['a', '', 'b']);
  });

  test('drops carriage return before a line break', () => {
    expect(splitLines('a\r\nb\r\n')).toEqual(['a', 'b']);
  });

  test('lone newline is one blank line', () => {
    expect(splitLines('\n')).toEqual(['']);
  });
});

describe('TextBuffer', () => {
  describe('load', () => {
    test('new buffer has one blank line', () => {
      const buf = new TextBuffer({ storage: new MemoryStorage() });
      expect(buf.lineCount).toBe(1);
      expect(buf.lineLen(0)).toBe(0);
    });

    test('splits content into lines', () => {
      const { buf } = makeBuffer('fn main() {\n}\n');
      expect(contents(buf)).toEqual(['fn main() {', '}']);
    });

    test('failed read yields a single blank line', () => {
      const storage = new MemoryStorage();
      const buf = new TextBuffer({ storage });
      buf.open('missing.rs');
      expect(contents(buf)).toEqual(['']);
    });

    test('failed read is indistinguishable from an empty file', () => {
      const storage = new MemoryStorage({ 'empty.rs': '' });
      const a = new TextBuffer({ storage });
      const b = new TextBuffer({ storage });
      a.open('empty.rs');
      b.open('missing.rs');
      expect(contents(a)).toEqual(contents(b));
    });

    test('load replaces previous content', () => {
      const storage = new MemoryStorage({ 'a.txt': 'one\ntwo', 'b.txt': 'three' });
      const buf = new TextBuffer({ storage });
      buf.open('a.txt');
      buf.open('b.txt');
      expect(contents(buf)).toEqual(['three']);
    });

    test('tags are aligned after load', () => {
      const { buf } = makeBuffer('let x = "a";\n/* c */');
      assertTagsAligned(buf);
    });
  });

  describe('save', () => {
    test('joins lines with a single newline', () => {
      const { buf, storage } = makeBuffer('ab\ncd');
      buf.save('out.txt');
      expect(storage.getText('out.txt')).toBe('ab\ncd');
    });

    test('round-trips content without a trailing line break', () => {
      const text = 'fn main() {\n    let x = 1;\n}';
      const storage = new MemoryStorage({ 'in.rs': text });
      const buf = new TextBuffer({ storage });
      buf.open('in.rs');
      buf.save('out.rs');
      expect(storage.getText('out.rs')).toBe(text);
    });

    test('write failure propagates and leaves buffer unchanged', () => {
      const { buf, storage } = makeBuffer('ab\ncd');
      storage.readOnly.add('locked.txt');
      expect(() => buf.save('locked.txt')).toThrow(StorageError);
      expect(contents(buf)).toEqual(['ab', 'cd']);
      expect(storage.has('locked.txt')).toBe(false);
    });

    test('file storage truncates longer existing content', () => {
      const dir = mkdtempSync(join(tmpdir(), 'keel-'));
      try {
        const path = join(dir, 'file.txt');
        writeFileSync(path, 'a much longer previous content');
        const buf = TextBuffer.fromText('short', { storage: new FileStorage() });
        buf.save(path);
        expect(readFileSync(path, 'utf8')).toBe('short');
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    test('file storage creates missing files and reads them back', () => {
      const dir = mkdtempSync(join(tmpdir(), 'keel-'));
      try {
        const path = join(dir, 'new.txt');
        const storage = new FileStorage();
        TextBuffer.fromText('x\ny', { storage }).save(path);
        const buf = new TextBuffer({ storage });
        buf.open(path);
        expect(contents(buf)).toEqual(['x', 'y']);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    test('file storage reports a write into a missing directory', () => {
      const buf = TextBuffer.fromText('x', { storage: new FileStorage() });
      const path = join(tmpdir(), 'keel-no-such-dir-for-test', 'deep', 'f.txt');
      expect(() => buf.save(path)).toThrow(StorageError);
    });
  });

  describe('insertChar', () => {
    test('inserts at the cursor and advances', () => {
      const { buf, cursor } = makeBuffer('ac');
      cursor.setPosition(1, 0);
      buf.insertChar('b', cursor);
      expect(contents(buf)).toEqual(['abc']);
      expect(cursor.getPosition()).toEqual({ x: 2, y: 0 });
    });

    test('tab becomes four spaces', () => {
      const { buf, cursor } = makeBuffer('');
      buf.insertChar('\t', cursor);
      expect(contents(buf)).toEqual(['    ']);
      expect(cursor.renderX).toBe(4);
      expect(cursor.x).toBe(4);
    });

    test('tab width follows the buffer option', () => {
      const buf = new TextBuffer({ storage: new MemoryStorage(), tabWidth: 2 });
      const cursor = new Cursor({ width: 10, height: 5 });
      buf.insertChar('\t', cursor);
      expect(contents(buf)).toEqual(['  ']);
      expect(cursor.renderX).toBe(2);
    });

    test('inserts on the cursor line only', () => {
      const { buf, cursor } = makeBuffer('one\ntwo');
      cursor.setPosition(3, 1);
      buf.insertChar('!', cursor);
      expect(contents(buf)).toEqual(['one', 'two!']);
    });

    test('retokenizes after insert', () => {
      const { buf, cursor } = makeBuffer('le');
      cursor.setPosition(2, 0);
      buf.insertChar('t', cursor);
      expect(buf.lines[0].tags).toEqual(['keyword', 'keyword', 'keyword']);
    });
  });

  describe('newLine', () => {
    test('splits the line at the cursor', () => {
      const { buf, cursor } = makeBuffer('abcd');
      cursor.setPosition(2, 0);
      buf.newLine(cursor);
      expect(contents(buf)).toEqual(['ab', 'cd']);
      expect(cursor.getPosition()).toEqual({ x: 0, y: 1 });
    });

    test('at line end inserts an empty line after', () => {
      const { buf, cursor } = makeBuffer('ab\ncd');
      cursor.setPosition(2, 0);
      buf.newLine(cursor);
      expect(contents(buf)).toEqual(['ab', '', 'cd']);
    });

    test('at column 0 pushes the line down', () => {
      const { buf, cursor } = makeBuffer('ab');
      buf.newLine(cursor);
      expect(contents(buf)).toEqual(['', 'ab']);
      expect(cursor.getPosition()).toEqual({ x: 0, y: 1 });
    });
  });

  describe('deleteChar', () => {
    test('removes the character before the cursor', () => {
      const { buf, cursor } = makeBuffer('abc');
      cursor.setPosition(2, 0);
      buf.deleteChar(cursor);
      expect(contents(buf)).toEqual(['ac']);
      expect(cursor.getPosition()).toEqual({ x: 1, y: 0 });
    });

    test('at line start merges with the previous line', () => {
      const { buf, cursor } = makeBuffer('ab\ncd');
      cursor.setPosition(0, 1);
      buf.deleteChar(cursor);
      expect(contents(buf)).toEqual(['abcd']);
      expect(cursor.getPosition()).toEqual({ x: 2, y: 0 });
    });

    test('at document start is a no-op', () => {
      const { buf, cursor } = makeBuffer('ab\ncd');
      buf.deleteChar(cursor);
      expect(contents(buf)).toEqual(['ab', 'cd']);
      expect(cursor.getPosition()).toEqual({ x: 0, y: 0 });
    });

    test('merging an empty line keeps the cursor at the previous end', () => {
      const { buf, cursor } = makeBuffer('abc\n\nx');
      cursor.setPosition(0, 1);
      buf.deleteChar(cursor);
      expect(contents(buf)).toEqual(['abc', 'x']);
      expect(cursor.getPosition()).toEqual({ x: 3, y: 0 });
    });
  });

  describe('queries', () => {
    test('lineLen is 0 out of range', () => {
      const { buf } = makeBuffer('abc');
      expect(buf.lineLen(0)).toBe(3);
      expect(buf.lineLen(1)).toBe(0);
      expect(buf.lineLen(-1)).toBe(0);
    });

    test('findPhrase searches from the start offset', () => {
      const { buf } = makeBuffer('abcabc');
      expect(buf.findPhrase('abc', 0, 0)).toBe(0);
      expect(buf.findPhrase('abc', 0, 1)).toBe(3);
      expect(buf.findPhrase('abc', 0, 4)).toBeNull();
    });

    test('findPhrase is bounds-checked', () => {
      const { buf } = makeBuffer('abc');
      expect(buf.findPhrase('a', 5, 0)).toBeNull();
      expect(buf.findPhrase('a', 0, 10)).toBeNull();
    });

    test('getText joins lines', () => {
      const { buf } = makeBuffer('a\nb\nc');
      expect(buf.getText()).toBe('a\nb\nc');
    });
  });

  test('tags stay aligned through a sequence of edits', () => {
    const { buf, cursor } = makeBuffer('fn x() {\n  /* a */\n}');
    const steps: Array<() => void> = [
      () => buf.insertChar('"', cursor),
      () => buf.insertChar('\t', cursor),
      () => buf.newLine(cursor),
      () => buf.insertChar('/', cursor),
      () => buf.insertChar('*', cursor),
      () => buf.deleteChar(cursor),
      () => buf.deleteChar(cursor),
      () => buf.deleteChar(cursor),
      () => cursor.setPosition(0, 2),
      () => buf.deleteChar(cursor),
      () => buf.newLine(cursor),
    ];
    for (const step of steps) {
      step();
      assertTagsAligned(buf);
    }
  });

  test('without a tokenizer every tag is standard', () => {
    const buf = TextBuffer.fromText('let x = 1;', { storage: new MemoryStorage() });
    expect(new Set(buf.lines[0].tags)).toEqual(new Set(['standard']));
    expect(buf.colour('keyword')).toBe('reset');
  });
});

describe('Line', () => {
  test('splitAt keeps the head and returns the tail', () => {
    const line = new Line('hello world');
    const tail = line.splitAt(5);
    expect(line.content).toBe('hello');
    expect(tail.content).toBe(' world');
    expect(tail.tags.length).toBe(6);
  });

  test('findPhrase returns absolute offsets', () => {
    const line = new Line('xyxy');
    expect(line.findPhrase('xy', 1)).toBe(2);
    expect(line.findPhrase('zz', 0)).toBeNull();
  });
});
