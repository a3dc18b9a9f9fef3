import { describe, it } from "mocha";
import { expect } from "chai";

import { Mailbox, ReplySlot } from "../../src/registry/mailbox.js";

describe("registry/mailbox", () => {
  it("rejects a non-positive capacity", () => {
    expect(() => new Mailbox<number>(0)).to.throw(RangeError);
    expect(() => new Mailbox<number>(1.5)).to.throw(RangeError);
  });

  it("delivers messages in FIFO order", async () => {
    const mailbox = new Mailbox<number>(4);
    await mailbox.send(1);
    await mailbox.send(2);
    await mailbox.send(3);

    expect(mailbox.size).to.equal(3);
    expect([await mailbox.receive(), await mailbox.receive(), await mailbox.receive()]).to.deep.equal([1, 2, 3]);
  });

  it("hands a message straight to a waiting receiver", async () => {
    const mailbox = new Mailbox<string>(1);
    const pending = mailbox.receive();

    expect(await mailbox.send("ping")).to.equal(true);
    expect(await pending).to.equal("ping");
    expect(mailbox.size).to.equal(0);
  });

  it("suspends senders while the buffer is full", async () => {
    const mailbox = new Mailbox<number>(1);
    await mailbox.send(1);

    let admitted = false;
    const blocked = mailbox.send(2).then((accepted) => {
      admitted = accepted;
    });
    await Promise.resolve();
    expect(admitted).to.equal(false);
    expect(mailbox.size).to.equal(1);

    expect(await mailbox.receive()).to.equal(1);
    await blocked;
    expect(admitted).to.equal(true);
    expect(await mailbox.receive()).to.equal(2);
  });

  it("drains buffered messages after close and then yields null", async () => {
    const mailbox = new Mailbox<number>(2);
    await mailbox.send(7);
    mailbox.close();

    expect(mailbox.isClosed).to.equal(true);
    expect(await mailbox.send(8)).to.equal(false);
    expect(await mailbox.receive()).to.equal(7);
    expect(await mailbox.receive()).to.equal(null);
  });

  it("turns away blocked senders and wakes idle receivers on close", async () => {
    const full = new Mailbox<number>(1);
    await full.send(1);
    const blocked = full.send(2);
    full.close();
    expect(await blocked).to.equal(false);
    expect(await full.receive()).to.equal(1);
    expect(await full.receive()).to.equal(null);

    const empty = new Mailbox<number>(1);
    const idle = empty.receive();
    empty.close();
    expect(await idle).to.equal(null);
  });

  describe("ReplySlot", () => {
    it("keeps only the first settlement", async () => {
      const slot = new ReplySlot<string>();

      expect(slot.resolve("first")).to.equal(true);
      expect(slot.resolve("second")).to.equal(false);
      expect(slot.reject(new Error("late"))).to.equal(false);
      expect(slot.isSettled).to.equal(true);
      expect(await slot.promise).to.equal("first");
    });

    it("settles with the handler outcome", async () => {
      const ok = new ReplySlot<number>();
      await ok.settle(async () => 42);
      expect(await ok.promise).to.equal(42);

      const failed = new ReplySlot<number>();
      await failed.settle(() => {
        throw new Error("boom");
      });
      let caught: unknown;
      try {
        await failed.promise;
      } catch (error) {
        caught = error;
      }
      expect(caught).to.be.instanceOf(Error).with.property("message", "boom");
    });
  });
});
