/**
 * Output Module
 */

export { saveArticle, outputPaths, toJsonRecord } from './writer.js';
export { renderMarkdown } from './markdown.js';
export { writeBatchReport, type BatchReport } from './report.js';
