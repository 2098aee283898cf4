/**
 * Inspection API wire types. Amounts and weighted keys travel as strings.
 */

export const ErrorCodes = {
  INVALID_ADDRESS: 'INVALID_ADDRESS',
  INVALID_HASH: 'INVALID_HASH',
  REFERRAL_NOT_FOUND: 'REFERRAL_NOT_FOUND',
  ADDRESS_NOT_FOUND: 'ADDRESS_NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ErrorResponse {
  success: false;
  error: string;
  code: ErrorCode;
}

export interface AnvDto {
  addressType: number;
  address: string;
  anv: string;
}

export interface LotteryEntryDto {
  key: string;
  address: string;
}

export interface HealthResponse {
  status: 'ok';
  lotterySize: number;
  anvCount: number;
}

export interface ReferralResponse {
  success: true;
  referral: {
    codeHash: string;
    previousReferral: string;
    pubKeyId: string;
  };
}

export interface AddressResponse {
  success: true;
  address: string;
  referrer: string | null;
  children: string[];
  anv: AnvDto | null;
}

export interface AnvListResponse {
  success: true;
  count: number;
  anvs: AnvDto[];
}

export interface LotteryResponse {
  success: true;
  size: number;
  capacity: number;
  minKey: string | null;
  entries: LotteryEntryDto[];
}
