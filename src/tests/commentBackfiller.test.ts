import { describe, it, expect, vi } from 'vitest';
import {
  MAX_MORE_CHILDREN,
  fillMissing,
  findMissingCommentIds,
  mergeComments,
  parseMoreChildrenResponse,
} from '../utils/commentBackfiller';
import type { CommentMap, CommentRecord } from '../models/Comment';
import type { RequestParams } from '../api/jsonFetcher';
import { FetchError, ShapeError } from '../utils/errors';

const options = { baseUrl: 'https://www.reddit.com' };

function record(id: string, replies: string[] = [], parent: string | null = null): CommentRecord {
  return { id, parent, replies, body: `body ${id}`, ups: 1, downs: 0, author: 'tester' };
}

function commentMap(...records: CommentRecord[]): CommentMap {
  return new Map(records.map(r => [r.id, r]));
}

function moreChildren(...data: Record<string, unknown>[]) {
  return { json: { errors: [], data: { things: data.map(d => ({ kind: 't1', data: d })) } } };
}

function fakeFetcher(postResponse: unknown) {
  return {
    get: vi.fn(async (_url: string, _params: RequestParams): Promise<unknown> => ({})),
    post: vi.fn(async (_url: string, _params: RequestParams): Promise<unknown> => postResponse),
  };
}

describe('findMissingCommentIds', () => {
  it('returns reply ids that are not keys of the map', () => {
    const comments = commentMap(record('a', ['b', 'x']), record('b', ['y'], 'a'));
    expect(findMissingCommentIds(comments)).toEqual(['x', 'y']);
  });

  it('does not repeat an id referenced twice', () => {
    const comments = commentMap(record('a', ['x']), record('b', ['x']));
    expect(findMissingCommentIds(comments)).toEqual(['x']);
  });

  it(`stops at ${MAX_MORE_CHILDREN} ids`, () => {
    const replies = Array.from({ length: 25 }, (_, i) => `m${i}`);
    const missing = findMissingCommentIds(commentMap(record('a', replies)));

    expect(missing).toHaveLength(20);
    expect(missing).toEqual(replies.slice(0, 20));
  });
});

describe('parseMoreChildrenResponse', () => {
  it('reads things from the json envelope', () => {
    const nodes = parseMoreChildrenResponse(moreChildren({ id: 'z', parent_id: 't1_a', body: 'late' }));
    expect(nodes).toEqual([{ id: 'z', parent_id: 't1_a', body: 'late' }]);
  });

  it('reads things from the jquery command envelope', () => {
    const response = {
      jquery: [
        [0, 1, 'call', ['body']],
        [1, 2, 'attr', 'find'],
        [2, 3, 'call', [[{ kind: 't1', data: { id: 'q', parent_id: 't1_a', body: 'legacy' } }]]],
        [3, 4, 'call', ['.morecomments']],
      ],
    };

    expect(parseMoreChildrenResponse(response)).toEqual([{ id: 'q', parent_id: 't1_a', body: 'legacy' }]);
  });

  it('throws FetchError when the API reports errors', () => {
    const response = { json: { errors: [['TOO_MANY', 'too many ids', 'children']] } };
    expect(() => parseMoreChildrenResponse(response)).toThrow(FetchError);
  });

  it('throws ShapeError when things are missing', () => {
    expect(() => parseMoreChildrenResponse({ json: { errors: [], data: {} } }))
      .toThrow('Expected an array at json.data.things');
  });

  it('throws ShapeError for an unknown envelope', () => {
    expect(() => parseMoreChildrenResponse({ success: true })).toThrow(ShapeError);
    expect(() => parseMoreChildrenResponse([])).toThrow(ShapeError);
  });

  it('throws ShapeError when no jquery command carries comments', () => {
    expect(() => parseMoreChildrenResponse({ jquery: [[0, 1, 'call', ['body']]] }))
      .toThrow('No command carries the comment array at jquery');
  });
});

describe('mergeComments', () => {
  it('keeps existing records on conflict', () => {
    const existing = commentMap(record('a'));
    const fetched = commentMap({ ...record('a'), body: 'replacement' }, record('b'));

    const merged = mergeComments(existing, fetched);

    expect(merged.get('a')?.body).toBe('body a');
    expect([...merged.keys()]).toEqual(['a', 'b']);
    expect(existing.size).toBe(1);
  });
});

describe('fillMissing', () => {
  it('does not call the API when nothing is missing', async () => {
    const fetcher = fakeFetcher(moreChildren());
    const comments = commentMap(record('a', ['b']), record('b', [], 'a'));

    const result = await fillMissing(fetcher, comments, 'abc', options);

    expect(result).toBe(comments);
    expect(fetcher.post).not.toHaveBeenCalled();
  });

  it('posts the missing id once and adds the returned comment', async () => {
    const fetcher = fakeFetcher(moreChildren({
      id: 'z',
      parent_id: 't1_a',
      body: 'late',
      ups: 2,
      downs: 1,
      author: 'u2',
      replies: '',
    }));
    const comments = commentMap(record('a', ['z']));

    const result = await fillMissing(fetcher, comments, 'abc', options);

    expect(fetcher.post).toHaveBeenCalledTimes(1);
    expect(fetcher.post).toHaveBeenCalledWith('https://www.reddit.com/api/morechildren.json', {
      children: 'z',
      link_id: 't3_abc',
      api_type: 'json',
    });
    expect(result.get('z')).toEqual({
      id: 'z',
      parent: 'a',
      replies: [],
      body: 'late',
      ups: 2,
      downs: 1,
      author: 'u2',
    });
    expect(comments.has('z')).toBe(false);
  });

  it('requests at most 20 ids per call', async () => {
    const fetcher = fakeFetcher(moreChildren());
    const replies = Array.from({ length: 30 }, (_, i) => `m${i}`);

    await fillMissing(fetcher, commentMap(record('a', replies)), 'abc', options);

    const params = fetcher.post.mock.calls[0][1];
    expect(params.children).toBe(replies.slice(0, 20).join(','));
  });

  it('never overwrites an existing record', async () => {
    const fetcher = fakeFetcher(moreChildren(
      { id: 'a', parent_id: 't3_abc', body: 'changed' },
      { id: 'z', parent_id: 't1_a', body: 'new' }
    ));
    const original = record('a', ['z']);

    const result = await fillMissing(fetcher, commentMap(original), 'abc', options);

    expect(result.get('a')).toBe(original);
    expect(result.get('z')?.body).toBe('new');
  });

  it('skips returned comments without a body', async () => {
    const fetcher = fakeFetcher(moreChildren(
      { id: 'y', parent_id: 't1_a', body: '' },
      { id: 'z', parent_id: 't1_a', body: 'kept' }
    ));

    const result = await fillMissing(fetcher, commentMap(record('a', ['y', 'z'])), 'abc', options);

    expect([...result.keys()]).toEqual(['a', 'z']);
  });

  it('makes no further request once every reply is resolved', async () => {
    const fetcher = fakeFetcher(moreChildren({ id: 'z', parent_id: 't1_a', body: 'late' }));

    const first = await fillMissing(fetcher, commentMap(record('a', ['z'])), 'abc', options);
    const second = await fillMissing(fetcher, first, 'abc', options);

    expect(second).toBe(first);
    expect(fetcher.post).toHaveBeenCalledTimes(1);
  });

  it('propagates fetch failures', async () => {
    const fetcher = fakeFetcher(null);
    fetcher.post.mockRejectedValueOnce(new FetchError('Request failed', 'https://www.reddit.com/api/morechildren.json', 500));

    await expect(fillMissing(fetcher, commentMap(record('a', ['z'])), 'abc', options))
      .rejects.toBeInstanceOf(FetchError);
  });
});
