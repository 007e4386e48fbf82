import {
  ActionContext,
  ActionExecutor,
  ActionFailureError,
  AutomationInvocation,
  AutomationRule,
  CanonicalStatus,
  MockNotificationSender,
  Shipment,
  TimeoutError,
} from '../../src';

describe('ActionExecutor', () => {
  let sender: MockNotificationSender;
  let executor: ActionExecutor;
  let fetchSpy: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

  const shipment = new Shipment(
    'shp-1',
    'TRK-1',
    'ssw',
    CanonicalStatus.DELIVERED,
    2,
    'evt-2',
    'NF-1',
    '00000000000100',
    { customerTier: 'gold' },
  );
  const rule = new AutomationRule('rule-1', 'Delivered notice', [CanonicalStatus.DELIVERED]);
  const invocation = new AutomationInvocation(
    'inv-1',
    'shp-1',
    'rule-1',
    2,
    CanonicalStatus.DELIVERED,
    CanonicalStatus.OUT_FOR_DELIVERY,
    'evt-2',
  );
  const context: ActionContext = { shipment, rule, invocation };

  beforeEach(() => {
    sender = new MockNotificationSender();
    executor = new ActionExecutor(sender, { actionTimeoutMs: 50 });
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('notify', () => {
    it('should hand the request to the notification sender', async () => {
      await executor.execute(
        { type: 'notify', channel: 'email', template: 'delivered', recipient: 'ops@example.com' },
        0,
        context,
      );

      expect(sender.sent).toHaveLength(1);
      expect(sender.sent[0]).toMatchObject({
        channel: 'email',
        template: 'delivered',
        recipient: 'ops@example.com',
        shipmentId: 'shp-1',
        newStatus: CanonicalStatus.DELIVERED,
      });
      expect(sender.sent[0].context).toMatchObject({
        ruleId: 'rule-1',
        previousStatus: CanonicalStatus.OUT_FOR_DELIVERY,
        statusVersion: 2,
        trackingCode: 'TRK-1',
        attributes: { customerTier: 'gold' },
      });
    });

    it('should wrap sender failures with the action index', async () => {
      sender.failChannel('sms');

      const attempt = executor.execute(
        { type: 'notify', channel: 'sms', template: 'delivered' },
        3,
        context,
      );

      await expect(attempt).rejects.toThrow(ActionFailureError);
      await expect(attempt).rejects.toMatchObject({
        actionType: 'notify',
        actionIndex: 3,
        message: 'Action 3 (notify) of rule rule-1 failed: sms down',
      });
    });

    it('should time out a sender that never answers', async () => {
      const stuck = new MockNotificationSender();
      jest.spyOn(stuck, 'send').mockReturnValue(new Promise<void>(() => undefined));
      const slow = new ActionExecutor(stuck, { actionTimeoutMs: 20 });

      let caught: unknown;
      try {
        await slow.execute({ type: 'notify', channel: 'email', template: 'x' }, 0, context);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ActionFailureError);
      if (!(caught instanceof ActionFailureError)) return;
      expect(caught.cause).toBeInstanceOf(TimeoutError);
    });
  });

  describe('webhook', () => {
    it('should post the transition with an idempotency key', async () => {
      fetchSpy.mockResolvedValue(new Response(null, { status: 204 }));

      await executor.execute(
        {
          type: 'webhook',
          url: 'http://hooks.internal/delivered',
          headers: { authorization: 'Bearer test-secret' },
        },
        1,
        context,
      );

      expect(fetchSpy).toHaveBeenCalledTimes(1);
      const [url, init] = fetchSpy.mock.calls[0];
      expect(url).toBe('http://hooks.internal/delivered');
      expect(init?.method).toBe('POST');
      expect(init?.headers).toEqual({
        'content-type': 'application/json',
        'idempotency-key': 'shp-1:rule-1:2:1',
        authorization: 'Bearer test-secret',
      });
      expect(typeof init?.body === 'string' && JSON.parse(init.body)).toMatchObject({
        shipmentId: 'shp-1',
        newStatus: CanonicalStatus.DELIVERED,
      });
    });

    it('should fail on a non-2xx response', async () => {
      fetchSpy.mockResolvedValue(new Response('nope', { status: 502 }));

      await expect(
        executor.execute({ type: 'webhook', url: 'http://hooks.internal/x', method: 'PUT' }, 0, context),
      ).rejects.toThrow('Action 0 (webhook) of rule rule-1 failed: webhook responded with HTTP 502');
    });

    it('should abort a webhook that exceeds its timeout', async () => {
      let aborted = false;
      fetchSpy.mockImplementation(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              aborted = true;
              reject(new Error('aborted'));
            });
          }),
      );

      await expect(
        executor.execute({ type: 'webhook', url: 'http://hooks.internal/slow', timeoutMs: 10 }, 0, context),
      ).rejects.toThrow('webhook http://hooks.internal/slow timed out after 10ms');
      expect(aborted).toBe(true);
    });
  });
});
