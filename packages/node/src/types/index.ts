/**
 * Type barrel: re-exports all public types from @vigil/node.
 */

// DTOs
export {
  AmountSchema,
  PaginationQuerySchema,
  CreatePlanSchema,
  ListPlansQuerySchema,
  AddFundsSchema,
  UpdateBeneficiariesSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
} from "./dto.js";
export type {
  CreatePlanDto,
  ListPlansQuery,
  AddFundsDto,
  UpdateBeneficiariesDto,
  ListEventsQuery,
  ListStreamEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope, validationEnvelope } from "./error.js";
export type {
  ApiErrorCode,
  ErrorDetail,
  ErrorEnvelope,
  ValidationIssue,
} from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
