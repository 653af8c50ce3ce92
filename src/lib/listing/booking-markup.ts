// Class and attribute conventions of the Booking.com hotel page room table.
// When the site changes its markup, update these and the affected fields fall
// back to their placeholders until then.
export const BOOKING_MARKUP = {
  row: '.js-rt-block-row.e2e-hprt-table-row',
  roomTypeLabel: '.hprt-roomtype-icon-link',
  description: '.hprt-roomtype-link',
  price: '.prco-valign-middle-helper',
  cancellationPolicy: '.hprt-conditions-ntf',
  occupancy: '.hprt-occupancy-occupancy-info',
  quantitySelect: 'select.hprt-nos-select',
  quantityOption: 'option',
  breakfastIcon: '.bk-icon.-streamline-food_coffee',
  breakfastIconFillAttribute: 'fill',
  breakfastIncludedFill: '#008009',
  policyPanel: 'template',
  policyPanelIdPrefix: 'policyModal_',
  mealsHeading: 'h3',
  mealsHeadingText: 'Meals',
  mealsDescription: 'div.bui-list__description',
  currencyMarker: '$',
} as const;
