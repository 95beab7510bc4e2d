/**
 * Hierarchical topic matching.
 *
 * Patterns are `/`-delimited like topics. `+` stands for one segment and
 * `#` for the rest of the topic. Matching walks both strings a character at a
 * time:
 *
 * - `#` matches as soon as it is reached, wherever it sits in the pattern;
 *   anything after it is ignored ("a/#/z" matches "a/b/c").
 * - `+` consumes topic characters up to and including the next `/`, then the
 *   pattern skips past the `+` and its separator. An exhausted topic counts as
 *   a separator, so "a/+" matches "a/" and "ro+" matches "room".
 * - every other pattern character must equal the topic character.
 *
 * Brokers such as MQTT only accept `#` as the final segment; patterns written
 * that way behave identically here.
 */
export function matches(topic: string, pattern: string): boolean {
  let t = 0;
  let p = 0;

  for (;;) {
    if (topic.slice(t) === pattern.slice(p)) return true;

    const pc = pattern.charAt(p);
    const tc = topic.charAt(t);

    if (pc === "#") return true;
    if (pc === "" || (pc !== "+" && pc !== tc)) return false;

    if (pc !== "+") {
      t++;
      p++;
      continue;
    }

    // Inside a `+`: a separator (or the end of the topic) closes the segment.
    if (tc === "" || tc === "/") p += 2;
    if (tc !== "") t++;
  }
}

export function matchesAny(topic: string, patterns: Iterable<string>): boolean {
  for (const pattern of patterns) {
    if (matches(topic, pattern)) return true;
  }
  return false;
}
