import assert from "node:assert/strict";
import { test } from "node:test";
import { BalanceSchema, LinkInfoSchema } from "./index.js";
import { isSuccessResult, unwrapEnvelope } from "../envelope/index.js";

test("BalanceSchema reads the lightweight balance field", () => {
  const balance = BalanceSchema.parse({ balance: 1000 });

  assert.deepEqual(balance, {
    balance: 1000,
    useableBalance: 0,
    moneyLight: 0,
    money: 0,
    points: 0
  });
});

test("BalanceSchema prefers allBalance over balance", () => {
  const balance = BalanceSchema.parse({ balance: 5, allBalance: 2500, money: 2000, moneyLight: 500 });

  assert.equal(balance.balance, 2500);
  assert.equal(balance.money, 2000);
  assert.equal(balance.moneyLight, 500);
});

test("LinkInfoSchema fills defaults for missing fields", () => {
  const link = LinkInfoSchema.parse({ orderId: "o-1", amount: 300 });

  assert.equal(link.orderId, "o-1");
  assert.equal(link.amount, 300);
  assert.equal(link.hasPassword, false);
  assert.equal(link.status, "");
});

test("unwrapEnvelope splits header and payload", () => {
  const body = unwrapEnvelope({ header: { resultCode: "S0000" }, payload: { balance: 1 } });

  assert.equal(body.resultCode, "S0000");
  assert.deepEqual(body.payload, { balance: 1 });
  assert.equal(isSuccessResult(body), true);
});

test("unwrapEnvelope passes bare bodies through", () => {
  const body = unwrapEnvelope({ balance: 1000 });

  assert.equal(body.resultCode, undefined);
  assert.deepEqual(body.payload, { balance: 1000 });
  assert.equal(isSuccessResult(body), true);
});

test("isSuccessResult rejects other result codes", () => {
  assert.equal(isSuccessResult(unwrapEnvelope({ header: { resultCode: "E1001" } })), false);
});
