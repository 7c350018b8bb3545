import { describe, expect, it } from "vitest";
import type { AuditLogEntryRequest } from "@vinstock/shared";
import { AuditService, type AuditRepository } from "./audit-service";

function recordingRepository(): AuditRepository & { entries: AuditLogEntryRequest[] } {
  const entries: AuditLogEntryRequest[] = [];
  return {
    entries,
    async insertAuditLog(entry) {
      entries.push(entry);
    }
  };
}

describe("AuditService", () => {
  it("stamps every entry with the request correlation id", async () => {
    const repository = recordingRepository();
    const audit = new AuditService(repository, { correlation_id: "req-7" });

    await audit.logCreate("customer", "c-1", { name: "Ana" });

    expect(repository.entries).toEqual([
      {
        entity_type: "customer",
        entity_id: "c-1",
        action: "CREATE",
        result: "SUCCESS",
        payload: { name: "Ana" },
        correlation_id: "req-7"
      }
    ]);
  });

  it("records only the fields that changed", async () => {
    const repository = recordingRepository();
    const audit = new AuditService(repository);

    await audit.logUpdate(
      "product",
      "p-1",
      { name: "Rosé", price: 12.5, description: "dry" },
      { name: "Rosé", price: 14 }
    );

    expect(repository.entries[0]?.changes).toEqual({
      before: { price: 12.5, description: "dry" },
      after: { price: 14, description: undefined }
    });
    expect(repository.entries[0]?.correlation_id).toBeNull();
  });

  it("propagates storage failures", async () => {
    const failure = new Error("audit table locked");
    const audit = new AuditService({
      async insertAuditLog() {
        throw failure;
      }
    });

    await expect(audit.logAction("sale", "s-1", "CANCEL")).rejects.toBe(failure);
  });
});
