import { Rect } from '../types';

const isEmpty = (rect: Rect) => rect.width <= 0 || rect.height <= 0;

/**
 * True when the two rectangles share a region of non-zero area.
 * Rectangles that only touch along an edge do not intersect.
 */
export const intersects = (a: Rect, b: Rect): boolean => {
    if (isEmpty(a) || isEmpty(b)) return false;
    return a.x < b.x + b.width && b.x < a.x + a.width && a.y < b.y + b.height && b.y < a.y + a.height;
};

// Edges inclusive, matching how the end-screen buttons are hit-tested.
export const containsPoint = (rect: Rect, x: number, y: number): boolean =>
    x >= rect.x && x <= rect.x + rect.width && y >= rect.y && y <= rect.y + rect.height;
