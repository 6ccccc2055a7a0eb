export interface ConfigType {
  app: {
    outputDir: string;
    requestDelayMs: number; // Nghỉ giữa các bài viết khi crawl listing
  };
  reddit: {
    baseUrl: string;
    userAgent: string;
    pageLimit: number;
    timeoutMs: number;
  };
}
