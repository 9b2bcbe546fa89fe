import * as timeConstants from '../src/common/time.constants';

describe('Time Constants', () => {
  describe('Base time units', () => {
    it('should define correct base time units', () => {
      expect(timeConstants.ONE_SECOND_IN_MILLISECONDS).toBe(1000);
      expect(timeConstants.ONE_MINUTE_IN_MILLISECONDS).toBe(60000);
      expect(timeConstants.ONE_HOUR_IN_MILLISECONDS).toBe(3600000);
    });
  });

  describe('Common durations', () => {
    it('should define correct durations', () => {
      expect(timeConstants.FIVE_SECONDS_IN_MILLISECONDS).toBe(5000);
      expect(timeConstants.TEN_SECONDS_IN_MILLISECONDS).toBe(10000);
      expect(timeConstants.THIRTY_SECONDS_IN_MILLISECONDS).toBe(30000);
      expect(timeConstants.FIVE_MINUTES_IN_MILLISECONDS).toBe(300000);
    });
  });

  describe('Poll interval', () => {
    it('should have consistent poll interval constants', () => {
      expect(timeConstants.POLL_INTERVAL_MIN_MS).toBe(100);
      expect(timeConstants.POLL_INTERVAL_MAX_MS).toBe(60000);
      expect(timeConstants.POLL_INTERVAL_DEFAULT_MS).toBe(1000);

      expect(timeConstants.POLL_INTERVAL_MIN_MS).toBeLessThan(timeConstants.POLL_INTERVAL_DEFAULT_MS);
      expect(timeConstants.POLL_INTERVAL_DEFAULT_MS).toBeLessThan(timeConstants.POLL_INTERVAL_MAX_MS);
    });
  });

  describe('Delivery timeouts', () => {
    it('should have consistent delivery timeout constants', () => {
      expect(timeConstants.DELIVERY_TIMEOUT_MIN_MS).toBe(1000);
      expect(timeConstants.DELIVERY_TIMEOUT_MAX_MS).toBe(60000);
      expect(timeConstants.DELIVERY_TIMEOUT_DEFAULT_MS).toBe(5000);

      expect(timeConstants.DELIVERY_TIMEOUT_MIN_MS).toBeLessThan(timeConstants.DELIVERY_TIMEOUT_DEFAULT_MS);
      expect(timeConstants.DELIVERY_TIMEOUT_DEFAULT_MS).toBeLessThan(timeConstants.DELIVERY_TIMEOUT_MAX_MS);
    });
  });

  describe('Debounce', () => {
    it('should keep the reload debounce default within its bound', () => {
      expect(timeConstants.CONFIG_RELOAD_DEBOUNCE_DEFAULT_MS).toBe(250);
      expect(timeConstants.CONFIG_RELOAD_DEBOUNCE_MAX_MS).toBe(10000);
      expect(timeConstants.FILE_WATCH_DEBOUNCE_MS).toBe(100);
    });
  });

  describe('Backoff timeouts', () => {
    it('should have consistent alert backoff constants', () => {
      expect(timeConstants.ALERT_BACKOFF_MIN_MS).toBe(100);
      expect(timeConstants.ALERT_BACKOFF_MAX_MS).toBe(60000);
      expect(timeConstants.ALERT_BACKOFF_DEFAULT_MS).toBe(1000);

      expect(timeConstants.ALERT_MAX_BACKOFF_MIN_MS).toBe(1000);
      expect(timeConstants.ALERT_MAX_BACKOFF_MAX_MS).toBe(300000);
      expect(timeConstants.ALERT_MAX_BACKOFF_DEFAULT_MS).toBe(30000);

      expect(timeConstants.ALERT_BACKOFF_DEFAULT_MS).toBeLessThan(timeConstants.ALERT_MAX_BACKOFF_DEFAULT_MS);
    });
  });
});
