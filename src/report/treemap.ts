export type Rect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

// Lays a row of areas along the shorter side of rect.
function layoutRow(areas: readonly number[], rect: Rect): Rect[] {
  const covered = sum(areas);

  if (rect.width >= rect.height) {
    const width = covered / rect.height;
    let y = rect.y;
    return areas.map((area) => {
      const height = area / width;
      const placed = { x: rect.x, y, width, height };
      y += height;
      return placed;
    });
  }

  const height = covered / rect.width;
  let x = rect.x;
  return areas.map((area) => {
    const width = area / height;
    const placed = { x, y: rect.y, width, height };
    x += width;
    return placed;
  });
}

function leftover(areas: readonly number[], rect: Rect): Rect {
  const covered = sum(areas);

  if (rect.width >= rect.height) {
    const width = covered / rect.height;
    return { x: rect.x + width, y: rect.y, width: rect.width - width, height: rect.height };
  }

  const height = covered / rect.width;
  return { x: rect.x, y: rect.y + height, width: rect.width, height: rect.height - height };
}

function worstRatio(areas: readonly number[], rect: Rect): number {
  return Math.max(
    ...layoutRow(areas, rect).map((placed) => Math.max(placed.width / placed.height, placed.height / placed.width)),
  );
}

/**
 * Squarified treemap layout (Bruls, Huizing, van Wijk). Values must be positive and
 * sorted descending; the returned rectangles are in input order with areas
 * proportional to the values and together tile `bounds`.
 */
export function squarify(values: readonly number[], bounds: Rect): Rect[] {
  const total = sum(values);
  if (values.length === 0 || total <= 0) return [];

  const scale = (bounds.width * bounds.height) / total;
  let remaining = values.map((value) => value * scale);
  let rect = bounds;
  const placed: Rect[] = [];

  while (remaining.length > 0) {
    if (remaining.length === 1) {
      placed.push(...layoutRow(remaining, rect));
      break;
    }

    let rowLength = 1;
    while (
      rowLength < remaining.length &&
      worstRatio(remaining.slice(0, rowLength), rect) >= worstRatio(remaining.slice(0, rowLength + 1), rect)
    ) {
      rowLength += 1;
    }

    const row = remaining.slice(0, rowLength);
    placed.push(...layoutRow(row, rect));
    rect = leftover(row, rect);
    remaining = remaining.slice(rowLength);
  }

  return placed;
}
