/**
 * Normalises the path prefix a dispatcher is mounted under: always a leading slash, never a trailing
 * one. The root mount is the empty string.
 */
export function getMountRoute(mountRoute: string | undefined): string {
  let normalized = (mountRoute ?? "").trim();

  if (normalized !== "" && !normalized.startsWith("/")) {
    normalized = `/${normalized}`;
  }

  if (normalized.endsWith("/")) {
    return normalized.slice(0, -1);
  }

  return normalized;
}

/**
 * The part of a request path below the mount route, or null when the path is outside it.
 */
export function stripMountRoute(pathname: string, mountRoute: string): string | null {
  if (mountRoute === "") {
    return pathname;
  }

  if (pathname === mountRoute) {
    return "/";
  }

  if (pathname.startsWith(`${mountRoute}/`)) {
    return pathname.slice(mountRoute.length);
  }

  return null;
}
