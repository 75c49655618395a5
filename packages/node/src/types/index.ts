export type { AppEnv, ValidatedBodyEnv } from "./api-contract.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";
export { createErrorEnvelope } from "./error.js";
export {
  ForwardEmailSchema,
  PreviewExpenseSchema,
} from "./dto.js";
export type { ForwardEmailDto, PreviewExpenseDto } from "./dto.js";
