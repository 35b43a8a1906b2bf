import { SELF_LINK, type AccessLevel, type EndpointDescriptor, type LinkSet } from "../types/access.js";

function isVisible(level: AccessLevel, descriptor: EndpointDescriptor): boolean {
  switch (level) {
    case "none":
      return false;
    case "restricted":
      return descriptor.restricted;
    case "full":
      return true;
  }
}

/** Discovery links visible at `level`: `self` first, then registration order. */
export function buildLinks(level: AccessLevel, descriptors: readonly EndpointDescriptor[], baseUrl: string): LinkSet {
  if (level === "none") {
    return {};
  }

  const normalizedBase = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
  const links: LinkSet = {
    [SELF_LINK]: { href: normalizedBase, templated: false }
  };
  for (const descriptor of descriptors) {
    if (descriptor.linkName === SELF_LINK || !isVisible(level, descriptor)) {
      continue;
    }
    links[descriptor.linkName] = {
      href: `${normalizedBase}/${descriptor.path}`,
      templated: descriptor.templated
    };
  }
  return links;
}
