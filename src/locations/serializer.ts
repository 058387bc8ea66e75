/**
 * Canonical text for location trees
 *
 * Output uses GenBank's own spelling with no whitespace, so
 * `parseLocation(formatLocation(tree))` rebuilds an equal tree.
 *
 * @module locations/serializer
 */

import { formatPosition } from "./position";
import type { Location } from "./types";

export function formatLocation(location: Location): string {
  switch (location.kind) {
    case "single":
      return formatPosition(location.position);
    case "range":
      return `${formatPosition(location.start)}..${formatPosition(location.end)}`;
    case "between":
      return `${location.left}^${location.right}`;
    case "complement":
      return `complement(${formatLocation(location.inner)})`;
    case "join":
    case "order":
      return `${location.kind}(${location.parts.map(formatLocation).join(",")})`;
    case "remote":
      return `${location.accession}:${formatLocation(location.inner)}`;
  }
}
