/**
 * Frame visiting order that starts at `start` and alternates outward:
 * start, start+1, start-1, start+2, start-2, ...
 * Each direction stops independently at the sequence bounds and the other
 * keeps draining, e.g. spiralOrder(4, 10) = 4,5,3,6,2,7,1,8,0,9.
 */
export function spiralOrder(start: number, length: number): number[] {
  if (length <= 0) return [];
  const origin = Math.min(Math.max(0, start), length - 1);

  const order: number[] = [origin];
  let forward = origin + 1;
  let backward = origin - 1;
  let takeForward = true;

  while (forward < length || backward >= 0) {
    if (takeForward && forward < length) {
      order.push(forward++);
    } else if (!takeForward && backward >= 0) {
      order.push(backward--);
    } else if (forward < length) {
      order.push(forward++);
    } else {
      order.push(backward--);
    }
    takeForward = !takeForward;
  }

  return order;
}
