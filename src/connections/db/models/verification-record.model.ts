import type { VerificationMethod } from '../../../constants';

export interface VerificationRecord {
  id: string;
  order_id: string;
  merchant_id: string;
  store_id: string | null;
  staff_id: string;
  staff_name: string;
  verification_method: VerificationMethod;
  created_at: Date;
}

export type CreateVerificationRecordInput = Omit<VerificationRecord, 'id'>;
