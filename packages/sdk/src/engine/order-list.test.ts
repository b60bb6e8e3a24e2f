import { describe, it, expect } from "vitest";
import { OrderList } from "./order-list.js";

function keys(list: OrderList<string, number>, reverse = false): string[] {
  return Array.from(list.nodes(reverse), (node) => node.key);
}

function abc(): OrderList<string, number> {
  const list = new OrderList<string, number>();
  list.append("a", 1);
  list.append("b", 2);
  list.append("c", 3);
  return list;
}

describe("OrderList", () => {
  it("should keep append order both ways", () => {
    const list = abc();

    expect(keys(list)).toEqual(["a", "b", "c"]);
    expect(keys(list, true)).toEqual(["c", "b", "a"]);
    expect(list.size).toBe(3);
    expect(list.head?.key).toBe("a");
    expect(list.tail?.key).toBe("c");
  });

  it("should unlink from the middle and both ends", () => {
    const list = abc();
    const b = list.node("b");
    if (!b) throw new Error("missing node");

    list.unlink(b);
    expect(keys(list)).toEqual(["a", "c"]);
    expect(list.node("b")).toBeUndefined();

    const head = list.node("a");
    const tail = list.node("c");
    if (!head || !tail) throw new Error("missing node");

    list.unlink(tail);
    expect(list.tail?.key).toBe("a");
    list.unlink(head);
    expect(list.head).toBeNull();
    expect(list.size).toBe(0);
  });

  it("should rekey without moving", () => {
    const list = abc();
    const node = list.node("b");
    if (!node) throw new Error("missing node");

    list.rekey(node, "z");

    expect(keys(list)).toEqual(["a", "z", "c"]);
    expect(list.node("b")).toBeUndefined();
    expect(list.node("z")?.value).toBe(2);
  });

  it("should move nodes to either end", () => {
    const list = abc();
    const c = list.node("c");
    const a = list.node("a");
    if (!a || !c) throw new Error("missing node");

    list.moveToFront(c);
    expect(keys(list)).toEqual(["c", "a", "b"]);

    list.moveToBack(c);
    expect(keys(list)).toEqual(["a", "b", "c"]);

    list.moveToFront(a);
    expect(keys(list)).toEqual(["a", "b", "c"]);
  });

  it("should survive unlinking the node being visited", () => {
    const list = abc();
    const seen: string[] = [];

    for (const node of list.nodes()) {
      seen.push(node.key);
      list.unlink(node);
    }

    expect(seen).toEqual(["a", "b", "c"]);
    expect(list.size).toBe(0);
    expect(list.head).toBeNull();
  });

  it("should clone independently", () => {
    const list = abc();
    const copy = list.clone();
    const node = copy.node("a");
    if (!node) throw new Error("missing node");

    copy.unlink(node);

    expect(keys(list)).toEqual(["a", "b", "c"]);
    expect(keys(copy)).toEqual(["b", "c"]);
  });
});
