import type { OperationKind } from "@shared/operations";
import type { InsertTenantPolicy, TenantPolicy } from "@shared/schema";
import { PolicyLookupFailure } from "../errors";

export interface TenantPolicyStore {
  getPolicy(tenantId: string): Promise<TenantPolicy | null>;
  upsertPolicy(policy: InsertTenantPolicy): Promise<TenantPolicy>;
}

export class InMemoryTenantPolicyStore implements TenantPolicyStore {
  private readonly policies = new Map<string, TenantPolicy>();

  async getPolicy(tenantId: string): Promise<TenantPolicy | null> {
    const policy = this.policies.get(tenantId);
    return policy ? { ...policy, approvalRequiredOperations: [...policy.approvalRequiredOperations] } : null;
  }

  async upsertPolicy(policy: InsertTenantPolicy): Promise<TenantPolicy> {
    const record: TenantPolicy = {
      tenantId: policy.tenantId,
      manualApprovalRequired: policy.manualApprovalRequired ?? false,
      approvalRequiredOperations: [...(policy.approvalRequiredOperations ?? [])],
      webhookUrl: policy.webhookUrl ?? null,
      webhookToken: policy.webhookToken ?? null,
      webhookAuthType: policy.webhookAuthType ?? "bearer",
      updatedAt: new Date(),
    };
    this.policies.set(record.tenantId, record);
    return { ...record };
  }
}

/** Loads a tenant's approval policy. Throws PolicyLookupFailure when none exists. */
export async function requireTenantPolicy(
  store: TenantPolicyStore,
  tenantId: string,
): Promise<TenantPolicy> {
  const policy = await store.getPolicy(tenantId);
  if (!policy) throw new PolicyLookupFailure(tenantId);
  return policy;
}

export function requiresManualApproval(policy: TenantPolicy, kind: OperationKind): boolean {
  return policy.manualApprovalRequired && policy.approvalRequiredOperations.includes(kind);
}
