// 2-D affine matrices in buffer coordinates (x to the right, y downward).
//
//   x' = a·x + c·y + tx
//   y' = b·x + d·y + ty

export interface AffineMatrix {
  a: number;
  b: number;
  c: number;
  d: number;
  tx: number;
  ty: number;
}

export interface Point {
  x: number;
  y: number;
}

export function identity(): AffineMatrix {
  return { a: 1, b: 0, c: 0, d: 1, tx: 0, ty: 0 };
}

export function translation(tx: number, ty: number): AffineMatrix {
  return { a: 1, b: 0, c: 0, d: 1, tx, ty };
}

/**
 * Positive angles turn counter-clockwise on screen, matching the y-up
 * convention tilt angles are measured in. With y growing downward that puts
 * the sine terms opposite to the textbook matrix.
 */
export function rotation(radians: number): AffineMatrix {
  const cos = Math.cos(radians);
  const sin = Math.sin(radians);
  return { a: cos, b: -sin, c: sin, d: cos, tx: 0, ty: 0 };
}

export function scaling(sx: number, sy: number): AffineMatrix {
  return { a: sx, b: 0, c: 0, d: sy, tx: 0, ty: 0 };
}

/** The transform that applies `first`, then `second`. */
export function concat(first: AffineMatrix, second: AffineMatrix): AffineMatrix {
  return {
    a: second.a * first.a + second.c * first.b,
    b: second.b * first.a + second.d * first.b,
    c: second.a * first.c + second.c * first.d,
    d: second.b * first.c + second.d * first.d,
    tx: second.a * first.tx + second.c * first.ty + second.tx,
    ty: second.b * first.tx + second.d * first.ty + second.ty,
  };
}

/** Applies the matrices left to right. */
export function chain(...steps: AffineMatrix[]): AffineMatrix {
  return steps.reduce(concat, identity());
}

/** Inverse matrix, or null when the matrix is singular. */
export function invert(m: AffineMatrix): AffineMatrix | null {
  const det = m.a * m.d - m.b * m.c;
  if (det === 0 || !Number.isFinite(det)) {
    return null;
  }
  return {
    a: m.d / det,
    b: -m.b / det,
    c: -m.c / det,
    d: m.a / det,
    tx: (m.c * m.ty - m.d * m.tx) / det,
    ty: (m.b * m.tx - m.a * m.ty) / det,
  };
}

export function applyToPoint(m: AffineMatrix, p: Point): Point {
  return {
    x: m.a * p.x + m.c * p.y + m.tx,
    y: m.b * p.x + m.d * p.y + m.ty,
  };
}
