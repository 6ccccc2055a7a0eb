import { JsonFetcher, RequestParams } from './jsonFetcher';
import { listingChildren, requireString } from '../utils/jsonShape';

// API trả tối đa 100 phần tử cho mỗi trang listing
export const MAX_PAGE_LIMIT = 100;

export interface ListingRequestOptions {
  pageLimit?: number;
}

export function listingParams(options: ListingRequestOptions = {}): RequestParams {
  return {
    limit: Math.min(options.pageLimit ?? MAX_PAGE_LIMIT, MAX_PAGE_LIMIT),
    raw_json: 1,
  };
}

/**
 * Lấy danh sách ID bài viết từ một listing URL (subreddit, front page, ...)
 * @param fetcher JsonFetcher dùng để gọi API
 * @param listingUrl URL của listing, ví dụ https://www.reddit.com/r/programming
 * @returns ID các bài viết theo đúng thứ tự API trả về
 */
export async function listLinkIds(
  fetcher: JsonFetcher,
  listingUrl: string,
  options: ListingRequestOptions = {}
): Promise<string[]> {
  const url = `${listingUrl.replace(/\/+$/, '')}/.json`;
  console.log(`Fetching link listing ${url}...`);

  const listing = await fetcher.get(url, listingParams(options));
  const ids = listingChildren(listing, 'listing').map((link, index) =>
    requireString(link.id, `listing.data.children[${index}].data.id`)
  );

  console.log(`Found ${ids.length} links in ${listingUrl}`);
  return ids;
}
