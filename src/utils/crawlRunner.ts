import { config } from '../config/config';
import { AxiosJsonFetcher } from '../api/jsonFetcher';
import { LinkComments, RedditCommentClient } from '../api/redditClient';
import { commentMapToObject, commentsFilePath, saveToJson } from './fileHelper';

/**
 * Tạo client từ cấu hình trong .env
 */
export function createClientFromConfig(): RedditCommentClient {
  const fetcher = new AxiosJsonFetcher({
    userAgent: config.reddit.userAgent,
    timeoutMs: config.reddit.timeoutMs,
  });

  return new RedditCommentClient(fetcher, {
    baseUrl: config.reddit.baseUrl,
    pageLimit: config.reddit.pageLimit,
    requestDelayMs: config.app.requestDelayMs,
  });
}

/**
 * Lưu comment của một bài viết vào thư mục output, trả về đường dẫn file
 */
export function saveLinkComments({ linkId, comments }: LinkComments): string {
  const filePath = commentsFilePath(config.app.outputDir, linkId);
  saveToJson(filePath, commentMapToObject(comments));
  return filePath;
}
