import { config } from './config/config';
import { ensureDirectoryExists } from './utils/fileHelper';
import { createClientFromConfig, saveLinkComments } from './utils/crawlRunner';

/**
 * Crawl comment của mọi bài viết trong một listing
 */
async function main() {
  const args = process.argv.slice(2);
  const fill = args.includes('--fill');
  const positional = args.filter(arg => !arg.startsWith('--'));

  // Kiểm tra mode: 'links' chỉ in danh sách ID, mặc định crawl toàn bộ listing
  // Cú pháp: npm start -- links <listing_url>
  //          npm start -- <listing_url> [--fill]
  const mode = positional[0] === 'links' ? 'links' : 'crawl';
  const listingUrl = mode === 'links' ? positional[1] : positional[0];

  if (!listingUrl) {
    console.error('ERROR: Listing URL is required. Usage: npm start -- [links] <listing_url> [--fill]');
    process.exit(1);
  }

  const client = createClientFromConfig();

  if (mode === 'links') {
    const linkIds = await client.listLinkIds(listingUrl);
    for (const linkId of linkIds) {
      console.log(linkId);
    }
    return;
  }

  ensureDirectoryExists(config.app.outputDir);
  console.log(`Starting Reddit comment crawler for ${listingUrl} (base: ${config.reddit.baseUrl})`);

  const results = await client.crawlListing(listingUrl, fill);
  for (const result of results) {
    saveLinkComments(result);
  }

  const total = results.reduce((sum, result) => sum + result.comments.size, 0);
  console.log(`Crawling completed successfully! ${total} comments from ${results.length} links`);
}

// Run the main function
main().catch((error) => {
  console.error('An error occurred:', error);
  process.exit(1);
});
