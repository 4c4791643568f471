/**
 * Puzzle helpers: rolling boards, archiving them for turn payloads,
 * and replaying moves onto them.
 */

import type {
  ArchivablePuzzle,
  Cube,
  CubeFace,
  CubeFaceSide,
  Language,
  LatticePoint,
  Move,
  Puzzle,
} from "@lexicube/types";
import { PUZZLE_SIZE } from "@lexicube/types";
import { LETTER_WEIGHTS } from "./constants";

export type RandomSource = () => number;

/** Generates a fresh board for a language. Injected wherever a board is needed. */
export type RandomCubes = (language: Language) => Puzzle;

const WEIGHTED_LETTERS = Object.entries(LETTER_WEIGHTS);
const TOTAL_WEIGHT = WEIGHTED_LETTERS.reduce((sum, [, weight]) => sum + weight, 0);

function pickLetter(random: RandomSource): string {
  let roll = random() * TOTAL_WEIGHT;
  for (const [letter, weight] of WEIGHTED_LETTERS) {
    if (roll < weight) return letter;
    roll -= weight;
  }
  return WEIGHTED_LETTERS[WEIGHTED_LETTERS.length - 1][0];
}

function face(letter: string, side: CubeFaceSide): CubeFace {
  return { letter, side, useCount: 0 };
}

function mapLattice<A, B>(grid: A[][][], transform: (value: A, index: LatticePoint) => B): B[][][] {
  return grid.map((plane, x) =>
    plane.map((row, y) => row.map((value, z) => transform(value, { x, y, z })))
  );
}

function emptyLattice(): null[][][] {
  return Array.from({ length: PUZZLE_SIZE }, () =>
    Array.from({ length: PUZZLE_SIZE }, () => Array.from({ length: PUZZLE_SIZE }, () => null))
  );
}

// English is the only dictionary today; the language picks the letter table once there are more.
export function randomCubes(_language: Language, random: RandomSource = Math.random): Puzzle {
  return mapLattice(emptyLattice(), () => ({
    top: face(pickLetter(random), "top"),
    left: face(pickLetter(random), "left"),
    right: face(pickLetter(random), "right"),
    wasRemoved: false,
  }));
}

export const liveRandomCubes: RandomCubes = (language) => randomCubes(language);

export function archivePuzzle(puzzle: Puzzle): ArchivablePuzzle {
  return mapLattice(puzzle, (cube) => ({
    top: cube.top.letter,
    left: cube.left.letter,
    right: cube.right.letter,
  }));
}

export function puzzleFromArchive(archive: ArchivablePuzzle): Puzzle {
  return mapLattice(archive, (cube) => ({
    top: face(cube.top, "top"),
    left: face(cube.left, "left"),
    right: face(cube.right, "right"),
    wasRemoved: false,
  }));
}

function samePoint(a: LatticePoint, b: LatticePoint): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

function used(cubeFace: CubeFace): CubeFace {
  return { ...cubeFace, useCount: cubeFace.useCount + 1 };
}

function applyMove(puzzle: Puzzle, move: Move): Puzzle {
  const { move: type } = move;
  return mapLattice(puzzle, (cube, index): Cube => {
    if (type.type === "removedCube") {
      return samePoint(type.index, index) ? { ...cube, wasRemoved: true } : cube;
    }
    let next = cube;
    for (const played of type.cubeFaces) {
      if (!samePoint(played.index, index)) continue;
      switch (played.side) {
        case "top":
          next = { ...next, top: used(next.top) };
          break;
        case "left":
          next = { ...next, left: used(next.left) };
          break;
        case "right":
          next = { ...next, right: used(next.right) };
          break;
      }
    }
    return next;
  });
}

/** Rebuild use counts and removed cubes by replaying moves in order. */
export function applyMoves(puzzle: Puzzle, moves: readonly Move[]): Puzzle {
  return moves.reduce(applyMove, puzzle);
}
