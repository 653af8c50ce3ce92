import { type BreakfastFlag, MEALS_NOT_SPECIFIED, NO_MEALS_INCLUDED } from '../roomtable-types.js';
import { BOOKING_MARKUP } from './booking-markup.js';
import type { ListingNode } from './tree.js';

/**
 * Whether the row's coffee icon is drawn in the "included" green
 */
export function readBreakfastIcon(row: ListingNode): boolean {
  const icon = row.findFirst(BOOKING_MARKUP.breakfastIcon);
  const fill = icon?.attr(BOOKING_MARKUP.breakfastIconFillAttribute) ?? '';
  return fill.trim().toLowerCase() === BOOKING_MARKUP.breakfastIncludedFill;
}

/**
 * Meals text from the policy panel that follows the row
 */
export function readMealsText(row: ListingNode): string {
  const panel = row.findFollowing(BOOKING_MARKUP.policyPanel, (node) =>
    (node.attr('id') ?? '').startsWith(BOOKING_MARKUP.policyPanelIdPrefix),
  );
  if (!panel) return MEALS_NOT_SPECIFIED;

  const heading = panel
    .findAllWithin(BOOKING_MARKUP.mealsHeading)
    .find((node) => node.text() === BOOKING_MARKUP.mealsHeadingText);
  if (!heading) return NO_MEALS_INCLUDED;

  const description = heading.findFollowing(BOOKING_MARKUP.mealsDescription);
  return description ? description.text() : MEALS_NOT_SPECIFIED;
}

/**
 * Combine the icon and the panel. The panel can only add breakfast, never
 * take away what the icon shows.
 */
export function mergeBreakfastSignals(iconIncluded: boolean, mealsText: string): BreakfastFlag {
  if (iconIncluded) return 'Yes';
  return /breakfast/i.test(mealsText) ? 'Yes' : 'No';
}
