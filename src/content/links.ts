const ALLOWED_SCHEMES = new Set(["http:", "https:", "mailto:", "ftp:", "tel:"]);
const SCHEME = /^[a-zA-Z][a-zA-Z0-9+.-]*:/;
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;

export const isExternalLink = (target: string): boolean => /^(?:[a-z][a-z0-9+.-]*:|\/\/)/i.test(target);

/**
 * Syntactic check of a link target. Returns null when the target is well formed,
 * otherwise the reason it is not. Nothing is fetched.
 */
export const checkLinkTarget = (target: string, { enclosed = false }: { enclosed?: boolean } = {}): string | null => {
  if (target.trim() === "") {
    return "link target is empty";
  }
  if (CONTROL_CHARACTERS.test(target)) {
    return "link target contains control characters";
  }
  if (!enclosed && /\s/.test(target)) {
    return `link target "${target}" contains whitespace`;
  }

  if (SCHEME.test(target)) {
    let url: URL;
    try {
      url = new URL(target);
    } catch {
      return `"${target}" is not a valid URL`;
    }
    if (!ALLOWED_SCHEMES.has(url.protocol)) {
      return `unsupported URL scheme "${url.protocol}" in "${target}"`;
    }
    if ((url.protocol === "http:" || url.protocol === "https:") && !url.hostname) {
      return `"${target}" has no host`;
    }
    if (url.protocol === "mailto:" && !url.pathname.includes("@")) {
      return `"${target}" has no email address`;
    }
    return null;
  }

  if (target.startsWith("//")) {
    return checkLinkTarget(`https:${target}`);
  }
  if (target === "#") {
    return "fragment link has no anchor";
  }
  if (target.includes("\\")) {
    return `relative link "${target}" uses backslashes`;
  }
  return null;
};
