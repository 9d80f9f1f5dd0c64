/**
 * ディスパッチャのテスト
 *
 * インデックスはインメモリの代役で置き換え、実行されたクエリ式を検証する。
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Dispatcher } from '../dispatcher.js';
import { INDEX_UNAVAILABLE_MESSAGE, type IndexState } from '../state.js';
import { TOOLS } from '../tools/index.js';
import type { ToolResponse } from '../tools/types.js';
import { FakeIndex, makeHit } from './helpers/fake-index.js';

const TEST_DIR = path.join(os.tmpdir(), `recoll-search-dispatcher-test-${process.pid}`);

function connected(index: FakeIndex): IndexState {
  return { status: 'connected', connection: index };
}

const unavailable: IndexState = { status: 'unavailable', reason: 'no index' };

function textOf(response: ToolResponse): string {
  expect(response.content).toHaveLength(1);
  return response.content[0].text;
}

function jsonOf(response: ToolResponse): unknown {
  return JSON.parse(textOf(response));
}

describe('Dispatcher', () => {
  beforeAll(async () => {
    await fs.mkdir(TEST_DIR, { recursive: true });
  });

  afterAll(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  describe('listTools', () => {
    it('5つのツールを定義順に返す', () => {
      const tools = new Dispatcher(unavailable).listTools();
      expect(tools.map((t) => t.name)).toEqual([
        'search_filesystem',
        'search_by_date',
        'search_by_filetype',
        'get_document_content',
        'list_recent_files',
      ]);
    });

    it('引数定義をJSON Schema形式で返す', () => {
      const tools = new Dispatcher(unavailable).listTools();
      const search = tools.find((t) => t.name === 'search_filesystem');

      expect(search?.inputSchema.required).toEqual(['query']);
      expect(search?.inputSchema.properties.max_results).toMatchObject({ type: 'integer', default: 20 });
      expect(search?.inputSchema.properties.include_preview).toMatchObject({
        type: 'boolean',
        default: true,
      });

      const byDate = tools.find((t) => t.name === 'search_by_date');
      expect(byDate?.inputSchema.required).toEqual(['query']);
      expect(byDate?.inputSchema.properties.start_date).toMatchObject({ type: 'string' });
      expect(Object.keys(byDate?.inputSchema.properties ?? {})).toEqual([
        'query',
        'start_date',
        'end_date',
        'max_results',
      ]);

      const recent = tools.find((t) => t.name === 'list_recent_files');
      expect(recent?.inputSchema.required).toEqual([]);
      expect(recent?.inputSchema.properties.days).toMatchObject({ type: 'integer', default: 7 });
    });

    it('ツール名の重複はエラー', () => {
      expect(() => new Dispatcher(unavailable, [TOOLS[0], TOOLS[0]])).toThrow(
        'Duplicate tool name: search_filesystem'
      );
    });
  });

  describe('dispatch', () => {
    it('未知のツールはインデックスに触れずにメッセージを返す', async () => {
      const index = new FakeIndex();
      const response = await new Dispatcher(connected(index)).dispatch('delete_everything', {});

      expect(textOf(response)).toBe('Unknown tool: delete_everything');
      expect(index.expressions).toEqual([]);
    });

    it('未知のツールはインデックスが無くても同じメッセージ', async () => {
      const response = await new Dispatcher(unavailable).dispatch('nope');
      expect(textOf(response)).toBe('Unknown tool: nope');
    });

    it('インデックスが無い場合、検索系ツールは固定メッセージを返す', async () => {
      const dispatcher = new Dispatcher(unavailable);

      for (const name of ['search_filesystem', 'search_by_date', 'search_by_filetype']) {
        const response = await dispatcher.dispatch(name, { query: 'x', filetype: 'pdf' });
        expect(textOf(response)).toBe(INDEX_UNAVAILABLE_MESSAGE);
      }
      expect(textOf(await dispatcher.dispatch('list_recent_files'))).toBe(INDEX_UNAVAILABLE_MESSAGE);
    });

    it('インデックスが無ければ引数が不正でも固定メッセージ', async () => {
      const dispatcher = new Dispatcher(unavailable);

      expect(textOf(await dispatcher.dispatch('search_filesystem', {}))).toBe(INDEX_UNAVAILABLE_MESSAGE);
      expect(textOf(await dispatcher.dispatch('list_recent_files', { days: 'seven' }))).toBe(
        INDEX_UNAVAILABLE_MESSAGE
      );
    });

    it('インデックスが無くても本文取得の引数は検証する', async () => {
      const response = await new Dispatcher(unavailable).dispatch('get_document_content', {});
      expect(textOf(response)).toMatch(/^Invalid arguments for get_document_content: url: /);
    });

    it('インデックスが無くても本文取得は動く', async () => {
      const filepath = path.join(TEST_DIR, 'hello.txt');
      await fs.writeFile(filepath, 'hello');

      const response = await new Dispatcher(unavailable).dispatch('get_document_content', {
        url: `file://${filepath}`,
      });

      expect(jsonOf(response)).toEqual({
        url: `file://${filepath}`,
        filepath,
        content: 'hello',
        truncated: false,
      });
    });

    it('読めないファイルは "Error reading file" を返す', async () => {
      const response = await new Dispatcher(unavailable).dispatch('get_document_content', {
        url: `file://${path.join(TEST_DIR, 'missing.txt')}`,
      });

      expect(textOf(response)).toMatch(/^Error reading file: ENOENT/);
    });

    it('必須引数が無ければ検証エラー', async () => {
      const index = new FakeIndex();
      const response = await new Dispatcher(connected(index)).dispatch('search_filesystem', {});

      expect(textOf(response)).toMatch(/^Invalid arguments for search_filesystem: query: /);
      expect(index.expressions).toEqual([]);
    });

    it('型の違う引数は検証エラー', async () => {
      const response = await new Dispatcher(connected(new FakeIndex())).dispatch('search_filesystem', {
        query: 'x',
        max_results: 'ten',
      });

      expect(textOf(response)).toMatch(/^Invalid arguments for search_filesystem: max_results: /);
    });

    it('search_filesystem はデフォルトでプレビュー付き', async () => {
      const index = new FakeIndex({ hits: [makeHit('todo.md')] });
      const response = await new Dispatcher(connected(index)).dispatch('search_filesystem', {
        query: 'todo yubikey',
      });

      expect(index.expressions).toEqual(['todo yubikey']);
      expect(jsonOf(response)).toEqual({
        query: 'todo yubikey',
        total_results: 1,
        returned_results: 1,
        results: [
          {
            filename: 'todo.md',
            url: 'file:///home/user/todo.md',
            mimetype: 'text/plain',
            size: 1024,
            mtime: '1735732800',
            mtime_readable: '2025-01-01 12:00:00',
            preview: 'About todo.md',
          },
        ],
      });
    });

    it('JSONはインデント2で埋め込む', async () => {
      const index = new FakeIndex({ hits: [] });
      const response = await new Dispatcher(connected(index)).dispatch('search_filesystem', { query: 'q' });

      expect(textOf(response)).toBe(
        '{\n  "query": "q",\n  "total_results": 0,\n  "returned_results": 0,\n  "results": []\n}'
      );
    });

    it('include_preview=false ではプレビューを含めない', async () => {
      const index = new FakeIndex({ hits: [makeHit('a.txt')] });
      const response = await new Dispatcher(connected(index)).dispatch('search_filesystem', {
        query: 'a',
        include_preview: false,
      });

      expect(JSON.stringify(jsonOf(response))).not.toContain('"preview"');
    });

    it('max_results件で取得を止める', async () => {
      const index = new FakeIndex({ hits: ['a', 'b', 'c', 'd'].map((n) => makeHit(n)) });
      const response = await new Dispatcher(connected(index)).dispatch('search_filesystem', {
        query: 'x',
        max_results: 2,
      });

      expect(jsonOf(response)).toMatchObject({ total_results: 4, returned_results: 2 });
      expect(index.fetchCount).toBe(2);
    });

    it('max_results=0 は取得しない', async () => {
      const index = new FakeIndex({ hits: [makeHit('a')] });
      const response = await new Dispatcher(connected(index)).dispatch('search_filesystem', {
        query: 'x',
        max_results: 0,
      });

      expect(jsonOf(response)).toMatchObject({ total_results: 1, returned_results: 0, results: [] });
      expect(index.fetchCount).toBe(0);
    });

    it('エンジンが総数より少なく返しても止まる', async () => {
      const index = new FakeIndex({ hits: [makeHit('a'), makeHit('b')], total: 10 });
      const response = await new Dispatcher(connected(index)).dispatch('search_filesystem', {
        query: 'x',
      });

      expect(jsonOf(response)).toMatchObject({ total_results: 10, returned_results: 2 });
      expect(index.fetchCount).toBe(3);
    });

    it('search_by_date は日付範囲を連結し、プレビューを含めない', async () => {
      const index = new FakeIndex({ hits: [makeHit('plan.md')] });
      const response = await new Dispatcher(connected(index)).dispatch('search_by_date', {
        query: 'todo',
        start_date: '2025-01-01',
      });

      expect(index.expressions).toEqual(['todo date:2025-01-01/']);
      const envelope = jsonOf(response);
      expect(envelope).toMatchObject({ query: 'todo date:2025-01-01/', returned_results: 1 });
      expect(JSON.stringify(envelope)).not.toContain('"preview"');
    });

    it('search_by_date の null の日付は未指定として扱う', async () => {
      const index = new FakeIndex();
      const dispatcher = new Dispatcher(connected(index));

      await dispatcher.dispatch('search_by_date', { query: 'todo', start_date: null, end_date: '2025-06-30' });
      await dispatcher.dispatch('search_by_date', { query: 'todo', start_date: null, end_date: null });

      expect(index.expressions).toEqual(['todo date:/2025-06-30', 'todo']);
    });

    it('search_by_filetype は mime: 句を連結する', async () => {
      const index = new FakeIndex({ hits: [] });
      const response = await new Dispatcher(connected(index)).dispatch('search_by_filetype', {
        query: 'yubikey',
        filetype: 'pdf',
      });

      expect(index.expressions).toEqual(['yubikey mime:pdf']);
      expect(jsonOf(response)).toMatchObject({ query: 'yubikey mime:pdf', total_results: 0 });
    });

    it('list_recent_files は days を先頭に含める', async () => {
      const index = new FakeIndex({ hits: [makeHit('new.txt')] });
      const response = await new Dispatcher(connected(index)).dispatch('list_recent_files', {});

      expect(index.expressions).toEqual(['date:7d/']);
      const text = textOf(response);
      expect(text.startsWith('{\n  "days": 7,\n  "query": "date:7d/",')).toBe(true);
      expect(jsonOf(response)).toMatchObject({ days: 7, total_results: 1, returned_results: 1 });
    });

    it('list_recent_files の days を指定できる', async () => {
      const index = new FakeIndex();
      await new Dispatcher(connected(index)).dispatch('list_recent_files', { days: 30, max_results: 5 });

      expect(index.expressions).toEqual(['date:30d/']);
    });

    it('エンジンのエラーは "Error executing search" になる', async () => {
      const index = new FakeIndex({ failWith: new Error('syntax error in query') });
      const response = await new Dispatcher(connected(index)).dispatch('search_filesystem', {
        query: 'AND AND',
      });

      expect(textOf(response)).toBe('Error executing search: syntax error in query');
    });

    it('呼び出しごとに新しいクエリで実行する', async () => {
      const index = new FakeIndex({ hits: [makeHit('a')] });
      const dispatcher = new Dispatcher(connected(index));

      const first = await dispatcher.dispatch('search_filesystem', { query: 'a' });
      const second = await dispatcher.dispatch('search_filesystem', { query: 'a' });

      expect(jsonOf(first)).toEqual(jsonOf(second));
      expect(index.expressions).toEqual(['a', 'a']);
    });
  });
});
