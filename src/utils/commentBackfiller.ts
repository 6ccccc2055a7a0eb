/**
 * Bổ sung các comment bị API ẩn sau "load more comments"
 */
import { JsonFetcher } from '../api/jsonFetcher';
import {
  CommentMap,
  LINK_KIND,
  RawCommentNode,
  hasBody,
  rawCommentChildren,
  toCommentRecord,
} from '../models/Comment';
import { isJsonObject, requireArray, requireObject } from './jsonShape';
import { FetchError, ShapeError } from './errors';

// Số ID tối đa gửi trong một lần gọi morechildren
export const MAX_MORE_CHILDREN = 20;

export interface BackfillOptions {
  baseUrl: string;
}

/**
 * ID xuất hiện trong `replies` nhưng chưa có trong map, theo thứ tự duyệt map,
 * không trùng lặp, tối đa `max` phần tử.
 */
export function findMissingCommentIds(comments: CommentMap, max: number = MAX_MORE_CHILDREN): string[] {
  const missing = new Set<string>();

  for (const record of comments.values()) {
    for (const replyId of record.replies) {
      if (missing.size >= max) return [...missing];
      if (!comments.has(replyId)) {
        missing.add(replyId);
      }
    }
  }

  return [...missing];
}

/**
 * Lấy các comment từ response của /api/morechildren.
 * Hỗ trợ cả envelope `json.data.things` (api_type=json) lẫn envelope `jquery` cũ,
 * trong đó mảng comment là tham số của lệnh "call" cuối cùng.
 */
export function parseMoreChildrenResponse(response: unknown): RawCommentNode[] {
  const envelope = requireObject(response, 'response');

  if (envelope.json !== undefined) {
    const json = requireObject(envelope.json, 'json');
    const errors = json.errors === undefined ? [] : requireArray(json.errors, 'json.errors');
    if (errors.length > 0) {
      throw new FetchError(`morechildren returned errors: ${JSON.stringify(errors)}`, 'morechildren');
    }

    const data = requireObject(json.data, 'json.data');
    return thingData(requireArray(data.things, 'json.data.things'), 'json.data.things');
  }

  if (envelope.jquery !== undefined) {
    const commands = requireArray(envelope.jquery, 'jquery');
    for (let i = commands.length - 1; i >= 0; i--) {
      const things = callArgumentThings(commands[i]);
      if (things) {
        return thingData(things, `jquery[${i}][3][0]`);
      }
    }
    throw new ShapeError('No command carries the comment array', 'jquery');
  }

  throw new ShapeError('Expected a json or jquery envelope', 'response');
}

function callArgumentThings(command: unknown): unknown[] | null {
  if (!Array.isArray(command) || command[2] !== 'call' || !Array.isArray(command[3])) {
    return null;
  }
  const things: unknown = command[3][0];
  if (!Array.isArray(things) || !things.every(isJsonObject)) {
    return null;
  }
  return things;
}

function thingData(things: unknown[], path: string): RawCommentNode[] {
  return things.map((thing, index) =>
    requireObject(requireObject(thing, `${path}[${index}]`).data, `${path}[${index}].data`)
  );
}

/**
 * Gộp hai map; khoá đã có trong `existing` không bao giờ bị ghi đè
 */
export function mergeComments(existing: CommentMap, fetched: CommentMap): CommentMap {
  const merged: CommentMap = new Map(existing);
  for (const [id, record] of fetched) {
    if (!merged.has(id)) {
      merged.set(id, record);
    }
  }
  return merged;
}

/**
 * Tìm các reply còn thiếu, lấy tối đa 20 comment qua một request morechildren
 * rồi gộp vào map.
 * @param fetcher JsonFetcher dùng để gọi API
 * @param comments Map đã làm phẳng từ trước
 * @param linkId ID bài viết (không có tiền tố t3_)
 * @returns Map mới; nếu không thiếu comment nào thì trả về chính `comments`
 */
export async function fillMissing(
  fetcher: JsonFetcher,
  comments: CommentMap,
  linkId: string,
  options: BackfillOptions
): Promise<CommentMap> {
  const missingIds = findMissingCommentIds(comments);
  if (missingIds.length === 0) {
    console.log(`No missing comments for link ${linkId}`);
    return comments;
  }

  console.log(`Fetching ${missingIds.length} missing comments for link ${linkId}...`);
  const url = `${options.baseUrl.replace(/\/+$/, '')}/api/morechildren.json`;
  const response = await fetcher.post(url, {
    children: missingIds.join(','),
    link_id: `${LINK_KIND}_${linkId}`,
    api_type: 'json',
  });

  const fetched: CommentMap = new Map();
  for (const node of parseMoreChildrenResponse(response)) {
    const record = toCommentRecord(node, rawCommentChildren(node));
    if (hasBody(record)) {
      fetched.set(record.id, record);
    }
  }

  const merged = mergeComments(comments, fetched);
  console.log(`Added ${merged.size - comments.size} comments to link ${linkId}`);
  return merged;
}
