/**
 * Learner State Module - Topic Normalization
 *
 * Mastery and error maps are keyed by topic, so every tag entering the core
 * goes through the same normalization and alias mapping first.
 */

/** Fallback for a tag that normalizes to nothing */
export const GENERAL_TOPIC = 'general';

/**
 * Primary topic -> known aliases (raw spellings, normalized on load).
 */
export type TopicTaxonomy = Readonly<Record<string, readonly string[]>>;

/**
 * Normalized alias -> primary topic.
 */
export interface TopicIndex {
  readonly aliases: ReadonlyMap<string, string>;
}

/**
 * Lowercases, hyphenates and strips a raw topic name.
 *
 * @example
 * normalizeTopic('Dynamic Programming'); // 'dynamic-programming'
 * normalizeTopic('HASH_TABLE'); // 'hash-table'
 */
export function normalizeTopic(raw: string): string {
  const normalized = raw
    .toLowerCase()
    .replace(/[_\s]+/g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');

  return normalized === '' ? GENERAL_TOPIC : normalized;
}

/**
 * Builds the alias lookup for a taxonomy. Primary names map to themselves.
 */
export function buildTopicIndex(taxonomy: TopicTaxonomy): TopicIndex {
  const aliases = new Map<string, string>();

  for (const [primary, spellings] of Object.entries(taxonomy)) {
    const primaryTopic = normalizeTopic(primary);
    aliases.set(primaryTopic, primaryTopic);
    for (const spelling of spellings) {
      const alias = normalizeTopic(spelling);
      if (!aliases.has(alias)) {
        aliases.set(alias, primaryTopic);
      }
    }
  }

  return { aliases };
}

/**
 * Maps a tag to its primary topic; unknown tags keep their normalized form.
 */
export function mapTagToTopic(tag: string, index: TopicIndex): string {
  const normalized = normalizeTopic(tag);
  return index.aliases.get(normalized) ?? normalized;
}

/**
 * Normalizes a topic set: primary names, unique, sorted. Blank entries are
 * dropped and an empty input stays empty.
 */
export function normalizeTopics(topics: readonly string[], index: TopicIndex): string[] {
  const result = new Set<string>();
  for (const topic of topics) {
    if (topic.trim() !== '') {
      result.add(mapTagToTopic(topic, index));
    }
  }
  return [...result].sort();
}

/**
 * @example
 * getTopicDisplayName('dynamic-programming'); // 'Dynamic Programming'
 */
export function getTopicDisplayName(topic: string): string {
  return topic
    .split('-')
    .filter((word) => word !== '')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
