import { describe, expect, it } from "vitest";

import {
  distanceFromCenter,
  matchingObjects,
  pickObject,
  sortLeftToRight,
  type VisibleObject
} from "./sceneQueries";

const leftPrinter: VisibleObject = {
  type: "printer",
  confidence: 0.9,
  box: { x: 0.05, y: 0.4, width: 0.1, height: 0.2 }
};
const centerBin: VisibleObject = {
  type: "trashBin",
  confidence: 0.8,
  box: { x: 0.45, y: 0.45, width: 0.1, height: 0.1 }
};
const rightPrinter: VisibleObject = {
  type: "printer",
  confidence: 0.7,
  box: { x: 0.6, y: 0.4, width: 0.3, height: 0.2 }
};

describe("distanceFromCenter", () => {
  it("measures from the middle of the frame", () => {
    expect(distanceFromCenter(centerBin.box)).toBeCloseTo(0);
    expect(distanceFromCenter(rightPrinter.box)).toBeCloseTo(0.25);
    expect(distanceFromCenter({ x: 0, y: 0, width: 0.2, height: 0.2 })).toBeCloseTo(Math.hypot(0.4, 0.4));
  });
});

describe("matchingObjects", () => {
  it("keeps every object without a target", () => {
    expect(matchingObjects([leftPrinter, centerBin], null)).toEqual([leftPrinter, centerBin]);
  });

  it("filters by type", () => {
    expect(matchingObjects([leftPrinter, centerBin, rightPrinter], "printer")).toEqual([leftPrinter, rightPrinter]);
    expect(matchingObjects([centerBin], "peacock")).toEqual([]);
  });
});

describe("pickObject", () => {
  const scene = [rightPrinter, leftPrinter, centerBin];

  it("finds the nearest and farthest objects", () => {
    expect(pickObject(scene, "nearest", null)).toBe(centerBin);
    expect(pickObject(scene, "farthest", null)).toBe(leftPrinter);
    expect(pickObject(scene, "nearest", "printer")).toBe(rightPrinter);
  });

  it("keeps frame order on ties", () => {
    const left: VisibleObject = { ...leftPrinter, box: { x: 0.125, y: 0.375, width: 0.25, height: 0.25 } };
    const right: VisibleObject = { ...leftPrinter, box: { x: 0.625, y: 0.375, width: 0.25, height: 0.25 } };
    expect(pickObject([left, right], "farthest", null)).toBe(left);
    expect(pickObject([right, left], "nearest", null)).toBe(right);
  });

  it("draws a random candidate from the given source", () => {
    expect(pickObject(scene, "random", null, () => 0)).toBe(rightPrinter);
    expect(pickObject(scene, "random", null, () => 0.99)).toBe(centerBin);
    expect(pickObject(scene, "random", "printer", () => 0.5)).toBe(leftPrinter);
  });

  it("returns nothing when no object matches", () => {
    expect(pickObject([], "random", null, () => 0.5)).toBeUndefined();
    expect(pickObject(scene, "nearest", "mainDoor")).toBeUndefined();
  });
});

describe("sortLeftToRight", () => {
  it("orders by box centre without touching the input", () => {
    const scene = [rightPrinter, centerBin, leftPrinter];
    expect(sortLeftToRight(scene)).toEqual([leftPrinter, centerBin, rightPrinter]);
    expect(scene[0]).toBe(rightPrinter);
  });
});
