import { describe, it, expect } from "vitest";
import { storedOperationSchema } from "@shared/operations";
import { createBuyOperation, creativeOperation, updateOperation } from "../../__tests__/harness";
import { buildActionDetails } from "../actionDetails";
import {
  BACKGROUND_ASSIGNEE,
  buildBackgroundTask,
  buildPendingApprovalTask,
  newTaskId,
  taskActionFor,
} from "../taskFactory";

const HOUR_MS = 3_600_000;
const now = new Date("2026-01-01T09:00:00.000Z");

describe("task factory", () => {
  it("prefixes ids by step type", () => {
    expect(newTaskId("creation")).toMatch(/^c_[0-9a-f]{12}$/);
    expect(newTaskId("approval")).toMatch(/^a_[0-9a-f]{12}$/);
    expect(newTaskId("background_task")).toMatch(/^b_[0-9a-f]{12}$/);
  });

  it("builds a pending creation task with a 4 hour SLA", () => {
    const operation = storedOperationSchema.parse(createBuyOperation());

    const task = buildPendingApprovalTask({ tenantId: "tenant-a", operation, now });

    expect(task).toMatchObject({
      tenantId: "tenant-a",
      principalId: "principal-1",
      stepType: "creation",
      toolName: "create_media_buy",
      status: "pending_approval",
      owner: "publisher",
      action: "create",
      mediaBuyId: null,
      parentTaskId: null,
    });
    expect(task.dueAt.getTime() - now.getTime()).toBe(4 * HOUR_MS);
    expect(task.requestContext.operation).toEqual(operation);
  });

  it("maps update actions onto task actions", () => {
    const pause = storedOperationSchema.parse(updateOperation({ action: "pause_package", packageId: "pkg-1" }));
    const budget = storedOperationSchema.parse(updateOperation({ action: "update_package_budget", budget: 10 }));
    const activate = storedOperationSchema.parse(updateOperation({ action: "activate_order" }));

    expect(taskActionFor(pause)).toBe("pause");
    expect(taskActionFor(budget)).toBe("update");
    expect(taskActionFor(activate)).toBe("activate");
    expect(taskActionFor(storedOperationSchema.parse(creativeOperation()))).toBe("assign_creatives");
  });

  it("builds a working background task owned by the system", () => {
    const task = buildBackgroundTask({
      tenantId: "tenant-a",
      principalId: "principal-1",
      mediaBuyId: "mb-7",
      parentTaskId: "c_000000000001",
      polling: { intervalMs: 30_000, maxDurationMs: 900_000 },
      now,
    });

    expect(task).toMatchObject({
      stepType: "background_task",
      toolName: "order_approval",
      status: "working",
      owner: "system",
      assignedTo: BACKGROUND_ASSIGNEE,
      mediaBuyId: "mb-7",
      parentTaskId: "c_000000000001",
    });
    expect(task.dueAt.getTime() - now.getTime()).toBe(900_000);
    expect(task.requestContext.actionDetails).toMatchObject({
      actionType: "background_polling",
      pollingIntervalSeconds: 30,
      maxPollingDurationMinutes: 15,
    });
  });
});

describe("action details", () => {
  it("summarizes a creation for the reviewer", () => {
    const details = buildActionDetails(storedOperationSchema.parse(createBuyOperation()));

    expect(details).toMatchObject({
      actionType: "manual_creation",
      summary: "Create media buy buyer-ref-1 (1 package, budget 5000.00)",
      packages: [{ name: "Run of site", impressions: 100000, cpm: 50, budget: 5000 }],
      nextActionAfterApproval: "automatic_creation",
    });
    expect(details.instructions.slice(0, 2)).toEqual([
      "Confirm total budget of 5000.00 USD",
      "Confirm flight dates 2026-01-01 to 2026-01-08",
    ]);
  });

  it("describes package updates and activations differently", () => {
    const update = buildActionDetails(
      storedOperationSchema.parse(updateOperation({ action: "pause_package", packageId: "pkg-1" })),
    );
    const activation = buildActionDetails(storedOperationSchema.parse(updateOperation({ action: "activate_order" })));

    expect(update).toMatchObject({
      actionType: "approval",
      approvalType: "media_buy_update",
      summary: "pause package on package pkg-1 of mb-100",
    });
    expect(activation).toMatchObject({ actionType: "activation", summary: "Activate order mb-100" });
  });

  it("lists each creative for review", () => {
    const details = buildActionDetails(storedOperationSchema.parse(creativeOperation()));

    expect(details.summary).toBe("Assign 1 creative to mb-100");
    expect(details.instructions[0]).toBe("Review creative cr-1 (display_300x250): https://cdn.example.com/cr-1.png");
  });
});
