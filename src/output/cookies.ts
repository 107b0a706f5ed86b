/**
 * Cookie catalog listing
 */

import type { Cookie, Element } from "../models/types";
import { buildTable } from "./tables";

export function formatCookieList(
  cookies: readonly Cookie[],
  elements?: ReadonlyMap<string, Element>
): string {
  if (cookies.length === 0) return "No cookies match.";

  const table = buildTable({
    headers: ["Cookie", "Rarity", "Role", "Position", "Element"],
    widths: [36, 20, 10, 10, 13],
    rows: cookies.map((c) => [c.name, c.rarity, c.role, c.position, elements?.get(c.name) ?? "-"]),
  });

  return `${table}\n${cookies.length} cookies`;
}
