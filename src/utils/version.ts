// Release version, printed by --version - UPDATE THIS for each release
export const VERSION = '1.0.0'

export const PRODUCT_NAME = 'netsweep'
