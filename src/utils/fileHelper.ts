import fs from 'fs';
import path from 'path';
import { CommentMap, CommentRecord } from '../models/Comment';

/**
 * Ensures the directory exists, creating it if necessary
 * @param dirPath Directory path to check/create
 */
export const ensureDirectoryExists = (dirPath: string): void => {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
    console.log(`Created directory: ${dirPath}`);
  }
};

/**
 * Save data to a JSON file
 * @param filePath Path to save the file
 * @param data Data to save
 */
export const saveToJson = (filePath: string, data: unknown): void => {
  try {
    ensureDirectoryExists(path.dirname(filePath));

    fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
    console.log(`Data saved to ${filePath}`);
  } catch (error) {
    console.error(`Error saving data to ${filePath}:`, error);
    throw error;
  }
};

/**
 * Map không stringify được trực tiếp, chuyển sang object theo ID
 */
export const commentMapToObject = (comments: CommentMap): Record<string, CommentRecord> =>
  Object.fromEntries(comments);

/**
 * Đường dẫn file JSON cho comment của một bài viết: <outputDir>/comments/<linkId>_<yyyy-mm-dd>.json
 */
export const commentsFilePath = (outputDir: string, linkId: string, date: Date = new Date()): string =>
  path.join(outputDir, 'comments', `${linkId}_${date.toISOString().split('T')[0]}.json`);
