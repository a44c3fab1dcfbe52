import { beforeEach, describe, expect, it } from "vitest";
import { ConflictError, NotFoundError } from "../../../src/errors/AppError.js";
import { IndexRegistry } from "../../../src/services/IndexRegistry.js";
import { FakeRagStore } from "../../helpers/FakeRagStore.js";

describe("IndexRegistry", () => {
  const clock = new Date("2024-04-01T10:00:00.000Z");
  let store: FakeRagStore;
  let registry: IndexRegistry;

  beforeEach(() => {
    store = new FakeRagStore();
    registry = new IndexRegistry(store, 1536, () => clock);
  });

  it("creates an index with the default dimension", async () => {
    const index = await registry.create({ name: "alpha" });

    expect(index).toEqual({
      name: "alpha",
      dimension: 1536,
      description: null,
      createdAt: clock,
      updatedAt: clock
    });
  });

  it("rejects a duplicate name", async () => {
    await registry.create({ name: "alpha", dimension: 8 });

    await expect(registry.create({ name: "alpha", dimension: 16 })).rejects.toBeInstanceOf(ConflictError);
    expect((await registry.get("alpha")).dimension).toBe(8);
  });

  it("lists indexes by name with a total", async () => {
    for (const name of ["gamma", "alpha", "beta"]) {
      await registry.create({ name });
    }

    const page = await registry.list({ page: 2, pageSize: 2 });

    expect(page.total).toBe(3);
    expect(page.items.map((index) => index.name)).toEqual(["gamma"]);
  });

  it("updates only the description", async () => {
    await registry.create({ name: "alpha", description: "first" });
    const later = new Date("2024-04-02T10:00:00.000Z");
    const laterRegistry = new IndexRegistry(store, 1536, () => later);

    const updated = await laterRegistry.update("alpha", { description: null });

    expect(updated.description).toBeNull();
    expect(updated.createdAt).toEqual(clock);
    expect(updated.updatedAt).toEqual(later);
  });

  it("fails NotFound for absent indexes", async () => {
    await expect(registry.get("missing")).rejects.toBeInstanceOf(NotFoundError);
    await expect(registry.update("missing", { description: "x" })).rejects.toBeInstanceOf(NotFoundError);
    await expect(registry.delete("missing")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("deletes an index once", async () => {
    await registry.create({ name: "alpha" });

    await registry.delete("alpha");

    await expect(registry.get("alpha")).rejects.toBeInstanceOf(NotFoundError);
    await expect(registry.delete("alpha")).rejects.toBeInstanceOf(NotFoundError);
  });
});
