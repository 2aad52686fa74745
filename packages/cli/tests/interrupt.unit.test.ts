import { describe, it, expect } from "vitest";
import { installInterruptHandler, interruptMessage, type SignalSource } from "../src/lib/interrupt.js";

class FakeSignals implements SignalSource {
  readonly listeners = new Map<NodeJS.Signals, () => void>();

  once(event: NodeJS.Signals, listener: () => void): this {
    this.listeners.set(event, listener);
    return this;
  }

  removeListener(event: NodeJS.Signals, listener: () => void): this {
    if (this.listeners.get(event) === listener) this.listeners.delete(event);
    return this;
  }

  emit(event: NodeJS.Signals): void {
    this.listeners.get(event)?.();
  }
}

describe("interrupt handling", () => {
  it("has nothing to clean up before launch", () => {
    expect(interruptMessage("us-east-1", null)).toEqual(["interrupted before any instance was launched; nothing to clean up"]);
  });

  it("prints the teardown command for the current instance and exits 1", () => {
    const source = new FakeSignals();
    const printed: string[] = [];
    const exits: number[] = [];
    let current: string | null = null;
    installInterruptHandler({
      region: "eu-west-1",
      currentInstanceId: () => current,
      source,
      print: (line) => printed.push(line),
      exit: (code) => exits.push(code),
    });

    current = "i-0123456789abcdef0";
    source.emit("SIGTERM");

    expect(printed).toEqual([
      "interrupted; instance i-0123456789abcdef0 may still be running",
      "terminate it with: aws ec2 terminate-instances --region eu-west-1 --instance-ids i-0123456789abcdef0",
    ]);
    expect(exits).toEqual([1]);
  });

  it("removes its handlers when disposed", () => {
    const source = new FakeSignals();
    const dispose = installInterruptHandler({
      region: "us-east-1",
      currentInstanceId: () => null,
      source,
      print: () => {},
      exit: () => {},
    });
    expect([...source.listeners.keys()]).toEqual(["SIGINT", "SIGTERM"]);
    dispose();
    expect(source.listeners.size).toBe(0);
  });
});
