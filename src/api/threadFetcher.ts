import { JsonFetcher } from './jsonFetcher';
import { ListingRequestOptions, listingParams } from './threadLister';
import { RawCommentNode } from '../models/Comment';
import { listingChildren, requireArray } from '../utils/jsonShape';
import { ShapeError } from '../utils/errors';

export interface ThreadRequestOptions extends ListingRequestOptions {
  baseUrl: string;
}

/**
 * Lấy các comment cấp cao nhất của một bài viết.
 *
 * API trả về mảng 2 phần tử: [0] là listing của chính bài viết (bỏ qua),
 * [1] là listing comment. Mỗi comment trả về có thể chứa cả cây reply bên dưới.
 */
export async function fetchCommentThreads(
  fetcher: JsonFetcher,
  linkId: string,
  options: ThreadRequestOptions
): Promise<RawCommentNode[]> {
  const url = `${options.baseUrl.replace(/\/+$/, '')}/comments/${linkId}/.json`;
  console.log(`Fetching comment threads for link ${linkId}...`);

  const response = requireArray(await fetcher.get(url, listingParams(options)), 'response');
  if (response.length < 2) {
    throw new ShapeError(`Expected 2 listings, got ${response.length}`, 'response');
  }

  const threads = listingChildren(response[1], '[1]');
  console.log(`Fetched ${threads.length} top-level comments for link ${linkId}`);
  return threads;
}
