import assert from "node:assert/strict";
import test from "node:test";
import { DependencyError } from "../core/collaborators.js";
import { DEFAULT_REQUIRED_BALANCE } from "../core/coordinator.js";
import {
  ADMIN_A,
  ASSET,
  NULL_ADDRESS,
  OTHER_ASSET,
  OWNER,
  USER_1,
  createFixture,
} from "./helpers.js";

test("threshold defaults to 1010 units at four decimals", () => {
  const fx = createFixture();
  try {
    assert.equal(DEFAULT_REQUIRED_BALANCE, 10_100_000n);
    assert.equal(fx.coordinator.eligibility.requiredBalance(), 10_100_000n);
    assert.equal(fx.coordinator.eligibility.asset(), ASSET);
  } finally {
    fx.cleanup();
  }
});

test("balance check is inclusive at the threshold", async () => {
  const fx = createFixture({ requiredBalance: 1010n });
  try {
    const gate = fx.coordinator.eligibility;
    fx.oracle.setBalance(ASSET, USER_1, 1010n);
    assert.equal(await gate.hasSufficientBalance(USER_1), true);

    fx.oracle.setBalance(ASSET, USER_1, 1009n);
    assert.equal(await gate.hasSufficientBalance(USER_1), false);

    fx.oracle.setBalance(ASSET, USER_1, 5000n);
    assert.equal(await gate.hasSufficientBalance(USER_1), true);
  } finally {
    fx.cleanup();
  }
});

test("a zero threshold admits holders with no balance", async () => {
  const fx = createFixture();
  try {
    const updated = await fx.coordinator.updateThreshold(OWNER, 0n);
    assert.equal(updated.ok, true);
    assert.equal(await fx.coordinator.eligibility.hasSufficientBalance(USER_1), true);
  } finally {
    fx.cleanup();
  }
});

test("the balance is read from whichever asset is configured now", async () => {
  const fx = createFixture({ requiredBalance: 100n });
  try {
    fx.oracle.setBalance(ASSET, USER_1, 100n);
    fx.oracle.setBalance(OTHER_ASSET, USER_1, 99n);
    assert.equal(await fx.coordinator.eligibility.hasSufficientBalance(USER_1), true);

    const updated = await fx.coordinator.updateAsset(OWNER, OTHER_ASSET);
    assert.equal(updated.ok, true);
    if (updated.ok) {
      assert.deepEqual(updated.value.event, {
        type: "ASSET_UPDATED",
        occurredAt: "2026-03-01T12:00:00.000Z",
        previous: ASSET,
        next: OTHER_ASSET,
      });
    }
    assert.equal(fx.coordinator.eligibility.asset(), OTHER_ASSET);
    assert.equal(await fx.coordinator.eligibility.hasSufficientBalance(USER_1), false);
  } finally {
    fx.cleanup();
  }
});

test("only the owner may change the asset or threshold", async () => {
  const fx = createFixture();
  try {
    await fx.coordinator.addAdmin(OWNER, ADMIN_A);

    const assetByAdmin = await fx.coordinator.updateAsset(ADMIN_A, OTHER_ASSET);
    assert.equal(assetByAdmin.ok, false);
    if (!assetByAdmin.ok) assert.equal(assetByAdmin.error.kind, "Unauthorized");

    const thresholdByUser = await fx.coordinator.updateThreshold(USER_1, 1n);
    assert.equal(thresholdByUser.ok, false);
    if (!thresholdByUser.ok) assert.equal(thresholdByUser.error.kind, "Unauthorized");

    const nullAsset = await fx.coordinator.updateAsset(OWNER, NULL_ADDRESS);
    assert.equal(nullAsset.ok, false);
    if (!nullAsset.ok) assert.equal(nullAsset.error.kind, "InvalidAddress");

    assert.equal(fx.coordinator.eligibility.asset(), ASSET);
    assert.equal(fx.coordinator.eligibility.requiredBalance(), DEFAULT_REQUIRED_BALANCE);
  } finally {
    fx.cleanup();
  }
});

test("threshold updates record the previous and next values", async () => {
  const fx = createFixture();
  try {
    const updated = await fx.coordinator.updateThreshold(OWNER, 2500n);
    assert.equal(updated.ok, true);
    if (updated.ok) {
      assert.deepEqual(updated.value.event, {
        type: "THRESHOLD_UPDATED",
        occurredAt: "2026-03-01T12:00:00.000Z",
        previous: "10100000",
        next: "2500",
      });
    }
    assert.equal(fx.coordinator.eligibility.requiredBalance(), 2500n);
  } finally {
    fx.cleanup();
  }
});

test("a failing oracle surfaces as a balance_oracle dependency error", async () => {
  const fx = createFixture();
  try {
    fx.oracle.failing = true;
    await assert.rejects(
      () => fx.coordinator.eligibility.hasSufficientBalance(USER_1),
      (error: unknown) => {
        assert.ok(error instanceof DependencyError);
        assert.equal(error.dependency, "balance_oracle");
        return true;
      },
    );
  } finally {
    fx.cleanup();
  }
});
