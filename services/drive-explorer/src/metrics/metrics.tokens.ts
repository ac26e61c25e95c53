export const DEX_TRANSFER_ITEM_PROCESSED_TOTAL = Symbol('DEX_TRANSFER_ITEM_PROCESSED_TOTAL');
export const DEX_BROWSE_REQUESTS_TOTAL = Symbol('DEX_BROWSE_REQUESTS_TOTAL');
