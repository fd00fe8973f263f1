import { describe, expect, it } from 'vitest';
import { ORDER_STATUSES } from '../../../constants';
import type { OrderStatus } from '../../../constants';
import { OrderStateMachine } from '../orders.state-machine';

const DEFAULT_EDGES: Record<OrderStatus, OrderStatus[]> = {
  pending: ['confirmed', 'cancelled', 'refunding', 'verified'],
  confirmed: ['preparing', 'cancelled', 'verified'],
  preparing: ['ready', 'cancelled', 'verified'],
  ready: ['verified', 'cancelled'],
  verified: ['completed', 'refunding'],
  completed: [],
  cancelled: [],
  refunding: ['refunded', 'pending', 'verified'],
  refunded: [],
};

describe('OrderStateMachine', () => {
  const machine = new OrderStateMachine(['pending', 'confirmed', 'preparing', 'ready']);

  it('allows exactly the lifecycle edges', () => {
    for (const from of ORDER_STATUSES) {
      for (const to of ORDER_STATUSES) {
        expect(machine.canTransition(from, to), `${from} -> ${to}`).toBe(DEFAULT_EDGES[from].includes(to));
      }
    }
    expect(machine.edges()).toHaveLength(17);
  });

  it('adds the redemption edge only for configured statuses', () => {
    const strict = new OrderStateMachine(['ready']);

    expect(strict.canTransition('pending', 'verified')).toBe(false);
    expect(strict.canTransition('ready', 'verified')).toBe(true);
    expect(strict.isRedeemable('pending')).toBe(false);
    expect(strict.isRedeemable('ready')).toBe(true);
  });

  it('never treats refunding or terminal orders as redeemable', () => {
    expect(machine.isRedeemable('refunding')).toBe(false);
    expect(machine.isRedeemable('verified')).toBe(false);
    expect(machine.isRedeemable('completed')).toBe(false);
  });

  it('explains why a transition is rejected', () => {
    expect(machine.validate({ status: 'completed', pre_refund_status: null }, 'refunding')).toEqual({
      valid: false,
      error: "Cannot transition from terminal status 'completed'",
    });
    expect(machine.validate({ status: 'ready', pre_refund_status: null }, 'ready')).toEqual({
      valid: false,
      error: "Order is already in 'ready' status",
    });
    expect(machine.validate({ status: 'ready', pre_refund_status: null }, 'completed').valid).toBe(false);
  });

  it('restores only the stored pre-refund status', () => {
    expect(machine.validate({ status: 'refunding', pre_refund_status: 'pending' }, 'pending')).toEqual({ valid: true });
    expect(machine.validate({ status: 'refunding', pre_refund_status: 'pending' }, 'verified')).toEqual({
      valid: false,
      error: "Refund rejection must restore 'pending', not 'verified'",
    });
    expect(machine.validate({ status: 'refunding', pre_refund_status: 'pending' }, 'refunded')).toEqual({ valid: true });
  });

  it('requires a reason to cancel, request or reject a refund', () => {
    expect(machine.requiresReason('ready', 'cancelled')).toBe(true);
    expect(machine.requiresReason('verified', 'refunding')).toBe(true);
    expect(machine.requiresReason('refunding', 'verified')).toBe(true);
    expect(machine.requiresReason('refunding', 'refunded')).toBe(false);
    expect(machine.requiresReason('pending', 'confirmed')).toBe(false);
  });
});
