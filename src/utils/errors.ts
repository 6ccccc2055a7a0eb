export class CrawlerError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'CrawlerError';
  }
}

/**
 * Lỗi mạng, HTTP status không phải 2xx, hoặc body không phải JSON hợp lệ
 */
export class FetchError extends CrawlerError {
  constructor(message: string, public url: string, public status?: number) {
    super(message, 'FETCH');
    this.name = 'FetchError';
  }
}

/**
 * JSON đã decode nhưng không đúng cấu trúc mong đợi (thiếu `data.children`, ...)
 * `path` là vị trí trong JSON bị lỗi, ví dụ `[1].data.children`
 */
export class ShapeError extends CrawlerError {
  constructor(message: string, public path: string) {
    super(`${message} at ${path}`, 'SHAPE');
    this.name = 'ShapeError';
  }
}
