import { createClientFromConfig, saveLinkComments } from './utils/crawlRunner';

async function main() {
  // Lấy link ID từ tham số dòng lệnh
  const args = process.argv.slice(2);
  const fill = args.includes('--fill');
  const linkId = args.find(arg => !arg.startsWith('--'));

  if (!linkId) {
    console.error('ERROR: Link ID is required. Usage: npm run crawl-comments -- <link_id> [--fill]');
    process.exit(1);
  }

  console.log(`Starting comment crawler for link ${linkId}${fill ? ' (with missing comments)' : ''}`);
  const client = createClientFromConfig();

  let comments = await client.allComments(linkId);
  if (fill) {
    comments = await client.fillMissing(comments, linkId);
  }

  const filePath = saveLinkComments({ linkId, comments });
  console.log(`Saved ${comments.size} comments for link ${linkId} to ${filePath}`);
}

main().catch((error) => {
  console.error('An error occurred:', error);
  process.exit(1);
});
