export { ERROR_CODES, type ErrorCode } from "./error-codes";
export { PAGE_SIZE_NAMES, PAGE_SIZES, type PageSizeName } from "./page-sizes";
