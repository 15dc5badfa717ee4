/**
 * Policy Administration Service Tests
 */

import { TransactionCanceledException } from '@aws-sdk/client-dynamodb';
import { Policy } from '../models/policy.model';
import { PolicyStore } from '../repositories/policy.repository';
import { EngineError, PolicyNotFoundError, PolicyValidationError } from '../utils/errors';
import { PolicyAdminService } from './policy-admin.service';
import { buildDefaultPolicies } from './policy-resolver.service';

function fakeStore(policies: Policy[] = buildDefaultPolicies(new Date('2024-03-01T00:00:00.000Z'))): PolicyStore {
  return {
    listPolicies: jest.fn(async () => policies.map(policy => ({ ...policy }))),
    getPolicy: jest.fn(async (id: string) => policies.find(policy => policy.id === id) || null),
    createPolicy: jest.fn().mockResolvedValue(undefined),
    updatePolicy: jest.fn().mockResolvedValue(undefined),
    deletePolicy: jest.fn().mockResolvedValue(undefined),
    seedPolicies: jest.fn().mockResolvedValue(undefined)
  };
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

describe('Policy Administration Service', () => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation();
    jest.spyOn(console, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('listPolicies', () => {
    it('should return policies in evaluation order', async () => {
      const [deny, stepup, allow] = buildDefaultPolicies();
      const service = new PolicyAdminService(fakeStore([allow, deny, stepup]));

      const policies = await service.listPolicies();

      expect(policies.map(p => p.name)).toEqual(['high_risk_deny', 'medium_risk_stepup', 'low_risk_allow']);
    });
  });

  describe('getPolicy', () => {
    it('should throw PolicyNotFoundError for unknown ids', async () => {
      const service = new PolicyAdminService(fakeStore());
      await expect(service.getPolicy('pol_missing')).rejects.toThrow(PolicyNotFoundError);
    });
  });

  describe('createPolicy', () => {
    it('should append after the lowest priority by default', async () => {
      const store = fakeStore();
      const service = new PolicyAdminService(store);

      const policy = await service.createPolicy({
        name: 'office_only',
        description: 'Desktop access during office hours',
        action: 'allow',
        conditions: { business_hours_only: true, allowed_devices: ['desktop'] }
      });

      expect(policy.priority).toBe(4);
      expect(policy.id).toMatch(/^pol_[a-f0-9]{24}$/);
      expect(policy.predicates).toEqual([
        { kind: 'business_hours_only' },
        { kind: 'allowed_devices', devices: ['desktop'] }
      ]);
      expect(store.createPolicy).toHaveBeenCalledWith(policy, []);
      const logged = JSON.parse(jest.mocked(console.info).mock.calls[0][0]);
      expect(logged.event_type).toBe('POLICY_CREATED');
    });

    it('should insert at the top and shift every other policy in the same write', async () => {
      const store = fakeStore();
      const service = new PolicyAdminService(store);

      const policy = await service.createPolicy({
        name: 'foreign_country_stepup',
        action: 'stepup',
        conditions: { allowed_countries: ['AR'] },
        insertAtTop: true
      });

      expect(policy.priority).toBe(1);
      expect(store.createPolicy).toHaveBeenCalledTimes(1);
      expect(jest.mocked(store.createPolicy).mock.calls[0][1]).toEqual([
        { policyId: 'pol_high_risk_deny', fromPriority: 1, toPriority: 2 },
        { policyId: 'pol_medium_risk_stepup', fromPriority: 2, toPriority: 3 },
        { policyId: 'pol_low_risk_allow', fromPriority: 3, toPriority: 4 }
      ]);
    });

    it('should only shift policies at or below an explicit top priority', async () => {
      const store = fakeStore();
      const service = new PolicyAdminService(store);

      await service.createPolicy({ name: 'mid', action: 'deny', priority: 3, insertAtTop: true });

      expect(jest.mocked(store.createPolicy).mock.calls[0][1]).toEqual([
        { policyId: 'pol_low_risk_allow', fromPriority: 3, toPriority: 4 }
      ]);
    });

    it('should reject every invalid field at once without writing', async () => {
      const store = fakeStore();
      const service = new PolicyAdminService(store);

      const error = await captureError(service.createPolicy({
        name: ' ',
        action: 'maybe',
        priority: 1.5,
        conditions: { min_risk_score: 90, max_risk_score: 10 }
      }));

      expect(error).toBeInstanceOf(PolicyValidationError);
      expect(error instanceof PolicyValidationError && error.errors).toEqual([
        'Policy name is required',
        'Invalid action: maybe. Expected one of allow, stepup, deny',
        'min_risk_score cannot exceed max_risk_score',
        'Priority must be a non-negative integer'
      ]);
      expect(store.createPolicy).not.toHaveBeenCalled();
    });

    it('should reject a duplicate name', async () => {
      const store = fakeStore();
      const service = new PolicyAdminService(store);

      const error = await captureError(service.createPolicy({ name: 'low_risk_allow', action: 'allow' }));

      expect(error instanceof PolicyValidationError && error.code).toBe('POLICY_NAME_EXISTS');
      expect(store.createPolicy).not.toHaveBeenCalled();
    });

    it('should report a name lost to a concurrent create as a duplicate', async () => {
      const store = fakeStore();
      jest.mocked(store.createPolicy).mockRejectedValueOnce(new TransactionCanceledException({
        message: 'Transaction cancelled',
        $metadata: {},
        CancellationReasons: [{ Code: 'None' }, { Code: 'ConditionalCheckFailed' }]
      }));
      const service = new PolicyAdminService(store);

      const error = await captureError(service.createPolicy({ name: 'racing', action: 'deny' }));

      expect(error instanceof PolicyValidationError && error.code).toBe('POLICY_NAME_EXISTS');
    });

    it('should report a moved priority as a conflict', async () => {
      const store = fakeStore();
      jest.mocked(store.createPolicy).mockRejectedValueOnce(new TransactionCanceledException({
        message: 'Transaction cancelled',
        $metadata: {},
        CancellationReasons: [{ Code: 'None' }, { Code: 'None' }, { Code: 'ConditionalCheckFailed' }]
      }));
      const service = new PolicyAdminService(store);

      const error = await captureError(service.createPolicy({ name: 'top', action: 'deny', insertAtTop: true }));

      expect(error).toBeInstanceOf(EngineError);
      expect(error instanceof EngineError && error.code).toBe('CONFLICT');
    });

    it('should map a throttled write to a storage error', async () => {
      const store = fakeStore();
      const throttled = new Error('Rate exceeded');
      throttled.name = 'ProvisionedThroughputExceededException';
      jest.mocked(store.createPolicy).mockRejectedValueOnce(throttled);
      const service = new PolicyAdminService(store);

      const error = await captureError(service.createPolicy({ name: 'throttled', action: 'deny' }));

      expect(error instanceof EngineError && error.code).toBe('DATABASE_UNAVAILABLE');
    });
  });

  describe('updatePolicy', () => {
    it('should apply partial updates and keep the rest', async () => {
      const store = fakeStore();
      const service = new PolicyAdminService(store);

      const updated = await service.updatePolicy('pol_medium_risk_stepup', { action: 'deny' });

      expect(updated.action).toBe('deny');
      expect(updated.priority).toBe(2);
      expect(updated.predicates).toEqual([
        { kind: 'min_risk_score', value: 40 },
        { kind: 'max_risk_score', value: 74 }
      ]);
      expect(store.updatePolicy).toHaveBeenCalledWith(updated, 'medium_risk_stepup');
    });

    it('should refuse to rename onto an existing name', async () => {
      const store = fakeStore();
      const service = new PolicyAdminService(store);

      await expect(service.updatePolicy('pol_medium_risk_stepup', { name: 'low_risk_allow' }))
        .rejects.toThrow('Policy name already exists: low_risk_allow');
      expect(store.updatePolicy).not.toHaveBeenCalled();
    });

    it('should reject malformed conditions', async () => {
      const service = new PolicyAdminService(fakeStore());

      await expect(service.updatePolicy('pol_low_risk_allow', { conditions: { allowed_devices: ['watch'] } }))
        .rejects.toThrow(PolicyValidationError);
    });
  });

  describe('deletePolicy', () => {
    it('should delete an existing policy and log it', async () => {
      const store = fakeStore();
      const service = new PolicyAdminService(store);

      await service.deletePolicy('pol_low_risk_allow');

      expect(jest.mocked(store.deletePolicy).mock.calls[0][0].name).toBe('low_risk_allow');
      const logged = JSON.parse(jest.mocked(console.warn).mock.calls[0][0]);
      expect(logged.event_type).toBe('POLICY_DELETED');
    });

    it('should throw for unknown ids', async () => {
      const store = fakeStore();
      await expect(new PolicyAdminService(store).deletePolicy('pol_missing')).rejects.toThrow(PolicyNotFoundError);
      expect(store.deletePolicy).not.toHaveBeenCalled();
    });
  });

  describe('togglePolicy', () => {
    it('should flip the enabled flag', async () => {
      const service = new PolicyAdminService(fakeStore());

      await expect(service.togglePolicy('pol_high_risk_deny')).resolves.toMatchObject({ enabled: false });
    });

    it('should set the flag explicitly', async () => {
      const service = new PolicyAdminService(fakeStore());

      await expect(service.togglePolicy('pol_high_risk_deny', true)).resolves.toMatchObject({ enabled: true });
    });
  });
});
