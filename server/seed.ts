import type { InsertTenantPolicy } from "@shared/schema";
import type { Logger } from "./logger";
import type { TenantPolicyStore } from "./services/tenantPolicyService";

const DEV_POLICIES: InsertTenantPolicy[] = [
  {
    tenantId: "default",
    manualApprovalRequired: false,
    approvalRequiredOperations: [],
  },
  {
    tenantId: "approvals",
    manualApprovalRequired: true,
    approvalRequiredOperations: ["create_media_buy", "update_media_buy", "add_creative_assets"],
  },
];

/** Creates the development tenants' policies. Existing policies are left alone. */
export async function seedTenantPolicies(policies: TenantPolicyStore, logger: Logger): Promise<number> {
  let created = 0;
  for (const policy of DEV_POLICIES) {
    const existing = await policies.getPolicy(policy.tenantId);
    if (existing) continue;
    await policies.upsertPolicy(policy);
    created++;
  }
  logger.info({ created }, created > 0 ? "seeded tenant policies" : "tenant policies already seeded, skipping");
  return created;
}
