import dotenv from 'dotenv';
import path from 'path';
import { ConfigType } from './types';

// Load environment variables from .env file
dotenv.config();

export const config: ConfigType = {
  reddit: {
    baseUrl: process.env.REDDIT_BASE_URL || 'https://www.reddit.com',
    userAgent: process.env.REDDIT_USER_AGENT || 'reddit-thread-flattener/1.0',
    // API chỉ trả tối đa 100 phần tử mỗi trang, giá trị lớn hơn sẽ bị cắt
    pageLimit: parseInt(process.env.REDDIT_PAGE_LIMIT || '100', 10),
    timeoutMs: parseInt(process.env.REDDIT_TIMEOUT_MS || '30000', 10),
  },
  app: {
    outputDir: process.env.OUTPUT_DIR || path.join(__dirname, '../../data'),
    requestDelayMs: parseInt(process.env.REQUEST_DELAY_MS || '500', 10),
  },
};
