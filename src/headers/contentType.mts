export interface ContentType {
  mime: string;
  params: Map<string, string>;
}

/**
 * Splits a part's (or request's) Content-Type into its lower-cased mime type and parameters.
 *
 * Used for the `boundary` of a request and the `charset` of a text field. Parameters are
 * `token=token` or `token="quoted"` separated by `;`; the first occurrence of a name wins.
 *
 * Returns `null` if the value is missing, has no mime type, or any parameter is malformed.
 */
export function parseContentType(value: string | undefined): ContentType | null {
  if (!value) {
    return null;
  }
  const sep = value.indexOf(';');
  const mime = (sep === -1 ? value : value.substring(0, sep)).trim().toLowerCase();
  if (!mime) {
    return null;
  }
  const params = new Map<string, string>();
  if (sep !== -1) {
    const paramsStr = value.substring(sep + 1);
    // name=token or name="quoted \"string\"", anchored to the end of the previous match
    const matcher =
      /\s*([!#-'*+\-.0-:>-Z^-z|~]+)=(?:([!#-'*+\-.0-:>-Z^-z|~]+)|"((?:[^\x00-\x08\x0a-\x1f"\\\x7f]|\\.)*)")\s*(;|$)/gy;
    while (matcher.lastIndex !== paramsStr.length) {
      const match = matcher.exec(paramsStr);
      if (!match) {
        return null;
      }
      const key = match[1]!.toLowerCase();
      const paramValue = match[2] ?? match[3]?.replaceAll(/\\(.)/g, '$1') ?? '';
      if (!params.has(key)) {
        params.set(key, paramValue);
      }
    }
  }
  return { mime, params };
}
