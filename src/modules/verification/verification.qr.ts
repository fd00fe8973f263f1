import { z } from 'zod';
import { ValidationError } from '../../utils/errors';

export const QR_PAYLOAD_TYPE = 'order_verification';

const BARE_CODE_PATTERN = /^[A-Z0-9]{4,16}$/i;

const qrPayloadSchema = z.object({
  t: z.literal(QR_PAYLOAD_TYPE),
  code: z.string().regex(BARE_CODE_PATTERN),
});

/**
 * QR payload: base64url của JSON `{"t":"order_verification","code":"..."}`.
 */
export const encodeQrPayload = (code: string): string =>
  Buffer.from(JSON.stringify({ t: QR_PAYLOAD_TYPE, code }), 'utf8').toString('base64url');

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

/**
 * Decode a scanned payload to a verification code. Accepts either a bare code
 * or the encoded JSON form.
 */
export const decodeQrPayload = (payload: string): string => {
  const trimmed = payload.trim();
  if (!trimmed) {
    throw new ValidationError('QR payload is empty', [{ path: 'payload', message: 'QR payload không được để trống' }]);
  }

  // Mã trần: in trực tiếp lên QR
  if (BARE_CODE_PATTERN.test(trimmed)) {
    return trimmed.toUpperCase();
  }

  const decoded = parseJson(Buffer.from(trimmed, 'base64url').toString('utf8'));
  const parsed = qrPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new ValidationError('Malformed QR payload', [{ path: 'payload', message: 'QR payload không hợp lệ' }]);
  }
  return parsed.data.code.toUpperCase();
};
