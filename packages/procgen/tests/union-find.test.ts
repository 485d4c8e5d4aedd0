import { describe, expect, it } from "vitest";
import { UnionFind } from "../src/core/algorithms/union-find";

describe("UnionFind", () => {
  describe("Constructor", () => {
    it("starts with every element in its own set", () => {
      const uf = new UnionFind(5);
      for (let i = 0; i < 5; i++) {
        expect(uf.find(i)).toBe(i);
      }
      expect(uf.size).toBe(5);
      expect(uf.setCount).toBe(5);
    });

    it("handles a single element", () => {
      const uf = new UnionFind(1);
      expect(uf.find(0)).toBe(0);
      expect(uf.setCount).toBe(1);
    });
  });

  describe("find()", () => {
    it("returns the same root after a union", () => {
      const uf = new UnionFind(5);
      uf.union(0, 1);
      expect(uf.find(1)).toBe(uf.find(0));
    });

    it("flattens chains to a single root", () => {
      const uf = new UnionFind(10);
      uf.union(0, 1);
      uf.union(1, 2);
      uf.union(2, 3);

      const root = uf.find(3);
      expect(uf.find(0)).toBe(root);
      expect(uf.find(1)).toBe(root);
      expect(uf.find(2)).toBe(root);
    });

    it("returns out-of-range ids unchanged", () => {
      const uf = new UnionFind(5);
      expect(uf.find(10)).toBe(10);
      expect(uf.find(-1)).toBe(-1);
    });
  });

  describe("union()", () => {
    it("merges two different sets", () => {
      const uf = new UnionFind(5);
      expect(uf.union(0, 1)).toBe(true);
      expect(uf.connected(0, 1)).toBe(true);
      expect(uf.setCount).toBe(4);
    });

    it("returns false for elements already joined", () => {
      const uf = new UnionFind(5);
      uf.union(0, 1);
      uf.union(1, 2);
      expect(uf.union(2, 0)).toBe(false);
      expect(uf.setCount).toBe(3);
    });

    it("rejects out-of-range ids", () => {
      const uf = new UnionFind(3);
      expect(uf.union(0, 3)).toBe(false);
      expect(uf.union(-1, 0)).toBe(false);
      expect(uf.setCount).toBe(3);
    });

    it("reaches a single set after n - 1 merges", () => {
      const uf = new UnionFind(6);
      for (let i = 1; i < 6; i++) {
        expect(uf.union(i - 1, i)).toBe(true);
      }
      expect(uf.setCount).toBe(1);
      expect(uf.connected(0, 5)).toBe(true);
    });
  });

  describe("connected()", () => {
    it("keeps separate components apart", () => {
      const uf = new UnionFind(4);
      uf.union(0, 1);
      uf.union(2, 3);
      expect(uf.connected(0, 1)).toBe(true);
      expect(uf.connected(2, 3)).toBe(true);
      expect(uf.connected(1, 2)).toBe(false);
    });
  });
});
