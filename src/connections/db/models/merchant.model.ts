import type { MerchantStatus } from '../../../constants';

export interface Merchant {
  id: string;
  name: string;
  status: MerchantStatus;
}
