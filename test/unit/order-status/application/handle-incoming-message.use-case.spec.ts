import { UnprocessableEntityException } from '@nestjs/common';
import {
  GREETING_REPLY,
  HELP_REPLY,
  PROFANITY_WARNING_REPLY,
  UNKNOWN_REPLY,
} from '@/modules/order-status/application/use-cases/handle-incoming-message/responses';
import { HandleIncomingMessageUseCase } from '@/modules/order-status/application/use-cases/handle-incoming-message';
import type { ResolveOrderUseCase } from '@/modules/order-status/application/use-cases/resolve-order';
import { buildMetrics, buildOrder } from '../../../fixtures/order-status/fakes';

describe('HandleIncomingMessageUseCase', () => {
  function buildUseCase(options: { order?: ReturnType<typeof buildOrder> | null; delivered?: boolean } = {}) {
    const resolve = jest.fn().mockResolvedValue(options.order ?? null);
    const send = jest.fn().mockResolvedValue(options.delivered ?? true);
    const metrics = buildMetrics();
    const resolveOrder: Pick<ResolveOrderUseCase, 'resolve'> = { resolve };

    const useCase = new HandleIncomingMessageUseCase(
      resolveOrder as ResolveOrderUseCase,
      { send },
      metrics,
    );

    return { useCase, resolve, send, metrics };
  }

  const baseInput = { requestId: 'req-1', senderId: '15551234567' };

  it.each([
    ['hola', 'greeting', GREETING_REPLY],
    ['ayuda', 'help', HELP_REPLY],
    ['que tal', 'unknown', UNKNOWN_REPLY],
    ['sos un idiota', 'profanity', PROFANITY_WARNING_REPLY],
  ])('replies to "%s" as %s', async (text, intent, reply) => {
    const { useCase, send, resolve } = buildUseCase();

    const result = await useCase.execute({ ...baseInput, text });

    expect(result).toEqual({ intent, reply, delivered: true });
    expect(send).toHaveBeenCalledWith({ to: '15551234567', text: reply, requestId: 'req-1' });
    expect(resolve).not.toHaveBeenCalled();
  });

  it('resolves order codes for the sender and replies with the order', async () => {
    const { useCase, resolve, send } = buildUseCase({ order: buildOrder() });
    const controller = new AbortController();

    const result = await useCase.execute({
      ...baseInput,
      text: 'estado de ped-123',
      signal: controller.signal,
    });

    expect(resolve).toHaveBeenCalledWith({
      requestId: 'req-1',
      orderCode: 'PED-123',
      requesterId: '15551234567',
      signal: controller.signal,
    });
    expect(result.intent).toBe('order_code');
    expect(result.reply).toContain('• Código: PED-123');
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('replies with the not-found template when the order is absent', async () => {
    const { useCase } = buildUseCase({ order: null });

    const result = await useCase.execute({ ...baseInput, text: 'PED-999' });

    expect(result.reply).toContain('Usuario: 15551234567\nCódigo: PED-999');
  });

  it('reports a failed delivery without throwing', async () => {
    const { useCase, metrics } = buildUseCase({ delivered: false });

    const result = await useCase.execute({ ...baseInput, text: 'hola' });

    expect(result.delivered).toBe(false);
    expect(metrics.incrementOutboundMessage).toHaveBeenCalledWith(false);
    expect(metrics.incrementMessage).toHaveBeenCalledWith({ intent: 'greeting' });
  });

  it('rejects text that is empty after sanitizing', async () => {
    const { useCase, send } = buildUseCase();

    await expect(useCase.execute({ ...baseInput, text: '<br/>  ' })).rejects.toBeInstanceOf(
      UnprocessableEntityException,
    );
    expect(send).not.toHaveBeenCalled();
  });
});
