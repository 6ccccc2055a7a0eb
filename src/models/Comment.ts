import {
  JsonObject,
  isJsonObject,
  listingChildren,
  optionalNumber,
  optionalString,
  requireString,
} from '../utils/jsonShape';
import { ShapeError } from '../utils/errors';

/**
 * Payload `data` của một comment (kind t1) đúng như API trả về.
 * Các trường thường gặp: id, parent_id ("t1_xxx" hoặc "t3_xxx"), body, ups, downs,
 * author và replies (chuỗi rỗng hoặc một listing chứa các comment con).
 * Chưa được kiểm tra, chỉ đọc qua các hàm bên dưới.
 */
export type RawCommentNode = JsonObject;

export interface CommentRecord {
  id: string;
  parent: string | null;  // null nếu comment nằm ngay dưới bài viết
  replies: string[];      // ID các reply trực tiếp, có thể chưa có trong map
  body: string;
  ups: number;
  downs: number;
  author: string;
}

/**
 * Map từ comment ID sang CommentRecord, theo thứ tự duyệt.
 * Không đảm bảo đầy đủ: một ID trong `replies` có thể không có trong map.
 */
export type CommentMap = Map<string, CommentRecord>;

export const COMMENT_KIND = 't1';
export const LINK_KIND = 't3';

export function commentId(node: RawCommentNode): string {
  return requireString(node.id, 'id');
}

/**
 * Các comment con trực tiếp của node, lấy từ trường `replies` gốc.
 * API dùng chuỗi rỗng cho comment không có reply.
 */
export function rawCommentChildren(node: RawCommentNode): RawCommentNode[] {
  const replies = node.replies;
  if (replies === undefined || replies === null || replies === '') {
    return [];
  }
  if (!isJsonObject(replies)) {
    throw new ShapeError('Expected a listing or an empty string', `${commentId(node)}.replies`);
  }
  return listingChildren(replies, `${commentId(node)}.replies`);
}

/**
 * "t1_abc" -> "abc"; parent kiểu khác (bài viết "t3_...") -> null
 */
export function parentCommentId(parentId: string): string | null {
  const separator = parentId.indexOf('_');
  if (separator === -1) return null;

  const kind = parentId.slice(0, separator);
  const id = parentId.slice(separator + 1);
  return kind === COMMENT_KIND && id !== '' ? id : null;
}

/**
 * Chuẩn hoá một node thành CommentRecord
 * @param node Node gốc từ API
 * @param children Các node con đã lấy từ `replies` gốc trước khi chuẩn hoá
 */
export function toCommentRecord(node: RawCommentNode, children: RawCommentNode[]): CommentRecord {
  const id = commentId(node);

  return {
    id,
    parent: parentCommentId(requireString(node.parent_id, `${id}.parent_id`)),
    replies: children.map(commentId),
    body: optionalString(node.body, `${id}.body`) || '',
    ups: optionalNumber(node.ups, `${id}.ups`) || 0,
    downs: optionalNumber(node.downs, `${id}.downs`) || 0,
    author: optionalString(node.author, `${id}.author`) || '[deleted]',
  };
}

// Comment bị xoá được API trả về với body rỗng
export function hasBody(record: CommentRecord): boolean {
  return record.body !== '';
}
