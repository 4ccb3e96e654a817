export { inferLocale, type LocaleInfo } from './locale-detector.js';
export { inferYear, yearFromFilename, type YearInference } from './year-inference.js';
