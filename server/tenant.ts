import type { Request } from "express";

export type TenantContext = {
  tenantId: string;
  userId?: string;
  source: "header" | "system";
};

export class TenantResolutionError extends Error {
  constructor(message = "Missing tenant context") {
    super(message);
    this.name = "TenantResolutionError";
  }
}

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  if (Array.isArray(value)) return value[0];
  return value || undefined;
}

export function resolveTenantContext(req: Request): TenantContext {
  const tenantId = headerValue(req, "x-tenant-id");
  if (!tenantId) {
    throw new TenantResolutionError();
  }
  return { tenantId, userId: headerValue(req, "x-user-id"), source: "header" };
}
