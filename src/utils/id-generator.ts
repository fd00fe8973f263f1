import { randomInt } from 'crypto';
import { ID_PREFIX } from '../constants';

export interface IdGeneratorOptions {
  sequenceDigits?: number;
  now?: () => number;
  random?: (max: number) => number;
}

const PREFIX_PATTERN = /^[A-Z0-9]+$/;
const TIMESTAMP_WIDTH = 13;

/**
 * Business identifiers: `<PREFIX><13-digit epoch ms><N-digit suffix>`.
 *
 * Trong cùng một millisecond, suffix là một sequence bắt đầu từ offset ngẫu nhiên
 * và tăng dần (mod 10^N), nên không trùng trong một process. Khi sequence quay về
 * offset ban đầu thì chờ sang millisecond kế tiếp; nếu đồng hồ đang bị lùi thì
 * dùng luôn millisecond kế tiếp của timestamp đã cấp, không chờ.
 *
 * Uniqueness across processes is only probabilistic (random start offset).
 */
export class IdGenerator {
  private readonly modulus: number;
  private readonly sequenceDigits: number;
  private readonly now: () => number;
  private readonly random: (max: number) => number;

  private lastMs = -1;
  private sequence = 0;
  private sequenceStart = 0;

  constructor(options: IdGeneratorOptions = {}) {
    const digits = options.sequenceDigits ?? 6;
    if (!Number.isInteger(digits) || digits < 1 || digits > 9) {
      throw new RangeError(`sequenceDigits must be an integer in [1, 9], got ${digits}`);
    }
    this.sequenceDigits = digits;
    this.modulus = 10 ** digits;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? ((max: number) => randomInt(max));
  }

  next(prefix: string): string {
    if (!PREFIX_PATTERN.test(prefix)) {
      throw new RangeError(`Invalid identifier prefix: "${prefix}"`);
    }

    // Toàn bộ đoạn dưới chạy đồng bộ, không có await, nên là critical section
    let ms = Math.max(this.now(), this.lastMs);

    if (ms > this.lastMs) {
      this.startMillisecond(ms);
    } else {
      const nextSequence = (this.sequence + 1) % this.modulus;
      if (nextSequence === this.sequenceStart) {
        ms = this.nextMillisecond();
        this.startMillisecond(ms);
      } else {
        this.sequence = nextSequence;
      }
    }

    const timestamp = String(ms).padStart(TIMESTAMP_WIDTH, '0');
    const suffix = String(this.sequence).padStart(this.sequenceDigits, '0');
    return `${prefix}${timestamp}${suffix}`;
  }

  orderNumber(): string {
    return this.next(ID_PREFIX.ORDER);
  }

  paymentNumber(): string {
    return this.next(ID_PREFIX.PAYMENT);
  }

  refundNumber(): string {
    return this.next(ID_PREFIX.REFUND);
  }

  settlementNumber(): string {
    return this.next(ID_PREFIX.SETTLEMENT);
  }

  private startMillisecond(ms: number): void {
    this.lastMs = ms;
    this.sequence = this.random(this.modulus);
    this.sequenceStart = this.sequence;
  }

  private nextMillisecond(): number {
    let ms = this.now();
    if (ms < this.lastMs) {
      return this.lastMs + 1;
    }
    while (ms <= this.lastMs) {
      ms = this.now();
    }
    return ms;
  }
}
