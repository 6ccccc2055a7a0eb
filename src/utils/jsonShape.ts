/**
 * Các hàm đọc JSON chưa kiểm tra từ API.
 * Mỗi hàm ném ShapeError kèm đường dẫn thay vì trả về undefined khi sai kiểu.
 */
import { ShapeError } from './errors';

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function requireObject(value: unknown, path: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new ShapeError('Expected an object', path);
  }
  return value;
}

export function requireArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ShapeError('Expected an array', path);
  }
  return value;
}

export function requireString(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw new ShapeError('Expected a string', path);
  }
  return value;
}

// null và undefined đều được coi là không có giá trị
export function optionalString(value: unknown, path: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  return requireString(value, path);
}

export function optionalNumber(value: unknown, path: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number') {
    throw new ShapeError('Expected a number', path);
  }
  return value;
}

/**
 * Lấy payload `data` của từng phần tử trong `data.children` của một listing
 * @param listing Listing object (`{ kind: 'Listing', data: { children: [...] } }`)
 * @param path Đường dẫn của listing, dùng trong thông báo lỗi
 */
export function listingChildren(listing: unknown, path: string): JsonObject[] {
  const data = requireObject(requireObject(listing, path).data, `${path}.data`);
  const children = requireArray(data.children, `${path}.data.children`);

  return children.map((child, index) => {
    const childPath = `${path}.data.children[${index}]`;
    return requireObject(requireObject(child, childPath).data, `${childPath}.data`);
  });
}
