// Selector tables for LinkedIn feed markup, most specific first

import { MIN_DETAILS_LENGTH, MIN_FIELD_LENGTH } from '../../config/constants';
import type { CoreField } from './types/records';

export const POST_CONTAINER_SELECTORS = [
  'div.feed-shared-update-v2',
  'div.feed-shared-update-v2__description',
  'div.feed-shared-text',
] as const;

export type AcceptRule = (text: string) => boolean;

export interface SelectorStrategy {
  id: string;
  selector: string;
  /** Applied to the first element matched by `selector` */
  within?: string;
  /** `first`: only the first match is considered; `all`: first accepted match wins */
  scope: 'first' | 'all';
  accept: AcceptRule;
}

export const hasMinLength =
  (min: number): AcceptRule =>
  text =>
    [...text].length > min;

const isNotNumeric: AcceptRule = text => !/^\d+$/.test(text);

const acceptShort = hasMinLength(MIN_FIELD_LENGTH);
const acceptName: AcceptRule = text => acceptShort(text) && isNotNumeric(text);
const acceptDetails = hasMinLength(MIN_DETAILS_LENGTH);

export const NAME_STRATEGIES: readonly SelectorStrategy[] = [
  { id: 'name.hidden-actor-text', selector: 'span[aria-hidden="true"]', scope: 'first', accept: acceptShort },
  { id: 'name.actor-span', selector: 'span[class*="actor"]', scope: 'first', accept: acceptName },
  { id: 'name.name-span', selector: 'span[class*="name"]', scope: 'first', accept: acceptName },
  { id: 'name.actor-link', selector: 'a[class*="actor"]', scope: 'first', accept: acceptName },
  { id: 'name.actor-div', selector: 'div[class*="actor"]', scope: 'first', accept: acceptName },
];

export const TITLE_STRATEGIES: readonly SelectorStrategy[] = [
  {
    id: 'title.actor-description',
    selector: 'span.update-components-actor__description',
    scope: 'first',
    accept: acceptShort,
  },
  { id: 'title.description-span', selector: 'span[class*="description"]', scope: 'first', accept: acceptShort },
  { id: 'title.description-div', selector: 'div[class*="description"]', scope: 'first', accept: acceptShort },
  { id: 'title.title-span', selector: 'span[class*="title"]', scope: 'first', accept: acceptShort },
  { id: 'title.title-div', selector: 'div[class*="title"]', scope: 'first', accept: acceptShort },
];

export const PERIOD_STRATEGIES: readonly SelectorStrategy[] = [
  {
    id: 'period.sub-description-hidden',
    selector: 'span.update-components-actor__sub-description',
    within: 'span[aria-hidden="true"]',
    scope: 'first',
    accept: acceptShort,
  },
  { id: 'period.time-span', selector: 'span[class*="time"]', scope: 'first', accept: acceptShort },
  { id: 'period.date-span', selector: 'span[class*="date"]', scope: 'first', accept: acceptShort },
  { id: 'period.time-element', selector: 'time', scope: 'first', accept: acceptShort },
  {
    id: 'period.sub-description-span',
    selector: 'span[class*="sub-description"]',
    scope: 'first',
    accept: acceptShort,
  },
];

export const DETAILS_STRATEGIES: readonly SelectorStrategy[] = [
  {
    id: 'details.inline-show-more',
    selector: 'div.feed-shared-inline-show-more-text',
    scope: 'first',
    accept: acceptShort,
  },
  { id: 'details.text-div', selector: 'div[class*="text"]', scope: 'all', accept: acceptDetails },
  { id: 'details.content-div', selector: 'div[class*="content"]', scope: 'all', accept: acceptDetails },
  { id: 'details.body-div', selector: 'div[class*="body"]', scope: 'all', accept: acceptDetails },
  { id: 'details.paragraph', selector: 'p', scope: 'all', accept: acceptDetails },
  { id: 'details.text-span', selector: 'span[class*="text"]', scope: 'all', accept: acceptDetails },
];

export const FIELD_STRATEGIES: Record<CoreField, readonly SelectorStrategy[]> = {
  Name: NAME_STRATEGIES,
  Title: TITLE_STRATEGIES,
  Period: PERIOD_STRATEGIES,
  Details: DETAILS_STRATEGIES,
};
