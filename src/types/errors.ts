/**
 * 錯誤型別定義
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'GATEWAY_OPERATION_ERROR'
  | 'SIGNATURE_MISMATCH'
  | 'MALFORMED_RESPONSE';

export interface FieldError {
  field: string;
  message: string;
}
