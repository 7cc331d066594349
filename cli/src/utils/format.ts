import type { Item } from '@shelfwise/shared';

export function describeItem(item: Item): string {
  return item.author ? `${item.title} by ${item.author}` : item.title;
}

export function formatCatalogLine(item: Item): string {
  const topic = item.topic ? ` [${item.topic}]` : '';
  return `${item.id}  ${describeItem(item)}${topic}`;
}
