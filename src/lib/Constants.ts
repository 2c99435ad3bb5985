export default class Constants {
  static BASE_9 = 10n ** 9n;   // fees and exposures
  static BASE_18 = 10n ** 18n; // oracle values, deviations, stablecoin decimals
  static BASE_27 = 10n ** 27n; // normalizer
  static BASE_36 = 10n ** 36n;

  static STABLE_DECIMALS = 18;

  static MAX_UINT128 = (1n << 128n) - 1n;
  static MAX_UINT256 = (1n << 256n) - 1n;
}
