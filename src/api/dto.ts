import { AddressANV, LotteryEntry } from '../types';
import { AnvDto, LotteryEntryDto } from './types';

export function toAnvDto(record: AddressANV): AnvDto {
  return {
    addressType: record.addressType,
    address: record.address,
    anv: record.anv.toString(),
  };
}

export function toLotteryEntryDto(entry: LotteryEntry): LotteryEntryDto {
  return {
    key: entry.key.toString(),
    address: entry.address,
  };
}
