import type { Request, Response, NextFunction } from "express";
import { TenantResolutionError, resolveTenantContext, type TenantContext } from "../tenant";

declare global {
  namespace Express {
    interface Request {
      tenantContext: TenantContext;
    }
  }
}

/**
 * Reads the x-tenant-id header into req.tenantContext.
 * Every task query downstream is scoped by it.
 */
export function tenantResolution(req: Request, res: Response, next: NextFunction) {
  try {
    req.tenantContext = resolveTenantContext(req);
    next();
  } catch (err) {
    if (err instanceof TenantResolutionError) {
      return res.status(401).json({ message: err.message });
    }
    next(err);
  }
}
