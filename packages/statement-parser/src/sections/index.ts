export { isValidNameFormat, matchesAccountHolderName, isAllCapsName } from './name-filter.js';
export { extractColumns, splitRowCells, detectHeader, segmentSections, type SectionBoundary } from './header-detector.js';
export { resolveColumnLayout, readColumnRow, type ColumnLayout, type ColumnRow } from './column-row.js';
export { attributeUser, findUsernameCandidates, isAddressLine, hasAccountOrCardPattern } from './user-attribution.js';
