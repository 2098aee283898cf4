export { createApp } from './app';
export { ErrorCodes } from './types';
export type {
  ErrorCode,
  ErrorResponse,
  AnvDto,
  LotteryEntryDto,
  HealthResponse,
  ReferralResponse,
  AddressResponse,
  AnvListResponse,
  LotteryResponse,
} from './types';
