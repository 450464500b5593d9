import { date, string, u32 } from "../src/registers.js";
import type { FakeChannel } from "./fakeChannel.js";

export interface NodeFixture {
  productId: number;
  rfAddress?: number;
  productName?: string;
}

/** Fill the registers every node shares with plausible values. */
export function seedNode(channel: FakeChannel, address: number, node: NodeFixture): void {
  channel.setWords(address, 40000, u32.encode(node.rfAddress ?? 0x00a1b2c3));
  channel.setWords(address, 40002, u32.encode(node.productId));
  channel.setWords(address, 40004, [0x0102]);
  channel.setWords(address, 40005, [1]);
  channel.setWords(address, 40006, [0]);
  channel.setWords(address, 40007, date.encode(new Date(Date.UTC(2022, 5, 1))));
  channel.setWords(address, 40009, date.encode(new Date(Date.UTC(2023, 0, 20))));
  channel.setWords(address, 40011, string(10).encode(node.productName ?? "TEST-NODE"));
  channel.setWords(address, 40021, u32.encode(node.productId));
}
