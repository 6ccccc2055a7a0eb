import { JsonFetcher } from './jsonFetcher';
import { listLinkIds } from './threadLister';
import { fetchCommentThreads } from './threadFetcher';
import { CommentMap, RawCommentNode } from '../models/Comment';
import { flatten } from '../utils/commentFlattener';
import { fillMissing } from '../utils/commentBackfiller';

export interface RedditCommentClientOptions {
  baseUrl: string;
  pageLimit?: number;
  requestDelayMs?: number; // Nghỉ giữa các bài viết trong crawlListing
}

export interface LinkComments {
  linkId: string;
  comments: CommentMap;
}

/**
 * Gom các thao tác lấy listing, lấy comment và bổ sung comment thiếu
 * quanh một JsonFetcher và base URL được truyền vào.
 */
export class RedditCommentClient {
  constructor(
    private readonly fetcher: JsonFetcher,
    private readonly options: RedditCommentClientOptions
  ) {}

  listLinkIds(listingUrl: string): Promise<string[]> {
    return listLinkIds(this.fetcher, listingUrl, { pageLimit: this.options.pageLimit });
  }

  fetchCommentThreads(linkId: string): Promise<RawCommentNode[]> {
    return fetchCommentThreads(this.fetcher, linkId, this.options);
  }

  /**
   * Toàn bộ comment API trả về cho một bài viết, đã làm phẳng.
   * Không tự động gọi fillMissing.
   */
  async allComments(linkId: string): Promise<CommentMap> {
    const threads = await this.fetchCommentThreads(linkId);
    const comments = flatten(threads);
    console.log(`Flattened ${comments.size} comments from ${threads.length} threads of link ${linkId}`);
    return comments;
  }

  fillMissing(comments: CommentMap, linkId: string): Promise<CommentMap> {
    return fillMissing(this.fetcher, comments, linkId, this.options);
  }

  /**
   * Crawl lần lượt từng bài viết trong listing
   * @param listingUrl URL của listing
   * @param fill Có gọi fillMissing cho từng bài viết hay không
   */
  async crawlListing(listingUrl: string, fill: boolean = false): Promise<LinkComments[]> {
    const linkIds = await this.listLinkIds(listingUrl);
    const results: LinkComments[] = [];

    // Chạy tuần tự thay vì Promise.all để tránh quá nhiều requests cùng lúc
    for (const [index, linkId] of linkIds.entries()) {
      if (index > 0 && this.options.requestDelayMs) {
        await new Promise(resolve => setTimeout(resolve, this.options.requestDelayMs));
      }

      let comments = await this.allComments(linkId);
      if (fill) {
        comments = await this.fillMissing(comments, linkId);
      }
      results.push({ linkId, comments });
    }

    console.log(`Crawled ${results.length} links from ${listingUrl}`);
    return results;
  }
}
