export { classifyLine, classifyLines, isInformationalLine } from './line-classifier.js';
export type { LineClass, LineKind, BoilerplateReason } from './line-classifier.js';
