export { detectCategory, extractKitName, extractTrailingIndex, fileStem } from './category-matcher';
export { sortSamplesByTrailingNumber } from './ordering';
