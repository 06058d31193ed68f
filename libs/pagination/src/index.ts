export * from "./types";
export { PageIterator, createPageIterator } from "./PageIterator";
export { TOTAL_COUNT_FIELDS, extractPage, findItemsField, mergePageToken } from "./extract";
