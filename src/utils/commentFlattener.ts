import {
  CommentMap,
  RawCommentNode,
  hasBody,
  rawCommentChildren,
  toCommentRecord,
} from '../models/Comment';

/**
 * Làm phẳng một cây comment (một comment gốc và toàn bộ reply của nó) thành CommentMap.
 *
 * Duyệt theo thứ tự pre-order bằng stack. Các node con được lấy từ `replies` gốc
 * trước khi chuẩn hoá, vì CommentRecord chỉ giữ lại danh sách ID.
 *
 * Comment có body rỗng bị bỏ khỏi kết quả nhưng reply của nó vẫn được duyệt,
 * và ID của nó vẫn nằm trong `replies` của comment cha.
 */
export function flattenThread(root: RawCommentNode): CommentMap {
  const comments: CommentMap = new Map();
  const stack: RawCommentNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;

    const children = rawCommentChildren(node);
    const record = toCommentRecord(node, children);
    if (hasBody(record)) {
      comments.set(record.id, record);
    }

    // Đẩy ngược để comment con đầu tiên được duyệt trước
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }

  return comments;
}

/**
 * Làm phẳng từng comment gốc rồi gộp lại; cây sau ghi đè cây trước nếu trùng ID
 */
export function flatten(roots: RawCommentNode[]): CommentMap {
  const comments: CommentMap = new Map();

  for (const root of roots) {
    for (const [id, record] of flattenThread(root)) {
      comments.set(id, record);
    }
  }

  return comments;
}
