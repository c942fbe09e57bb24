export { FileAnalyzer, analyzeFile, type FileAnalyzerOptions } from './file-analyzer.js';
export { normalizeSource, splitLines, readSourceFile } from './source-lines.js';
