/**
 * @fileoverview Engine for the minimal 8-byte dialect.
 *
 * A command header is answered at once with a 4-byte response. SCAN and
 * TMS_SEQ then stream their TMS (and, for SCAN, TDI) bytes; a SCAN finishes
 * by sending ceil(n/8) TDO bytes. Each call to pollLegacy moves the state
 * machine at most one step so the tick loop never blocks on the client.
 */

import type { ConnectionContext, EngineEnvironment } from '../bridge/connection-context';
import { getErrorMessage, isFramingError } from '../bridge/errors';
import type { SignalMailbox } from '../bridge/mailbox';
import type { Command } from '../bridge/types';
import {
  MINIMAL_RESPONSE_ERROR,
  MINIMAL_RESPONSE_OK,
  MINIMAL_STATUS_FRAMING_ERROR,
  MINIMAL_STATUS_OK,
  bytesForBits,
} from '../protocol/constants';
import {
  decodeMinimalHeader,
  encodeMinimalResponse,
  minimalHeaderToCommand,
} from '../protocol/minimal-codec';
import { RxAccumulator } from '../transport/byte-stream';
import { ScanSession } from './scan-session';

function reply(ctx: ConnectionContext, mailbox: SignalMailbox, failed: boolean): void {
  const { sample } = mailbox;
  ctx.tx.enqueue(
    encodeMinimalResponse({
      response: failed ? MINIMAL_RESPONSE_ERROR : MINIMAL_RESPONSE_OK,
      tdo: sample.tdo,
      mode: sample.activeMode,
      status: failed ? MINIMAL_STATUS_FRAMING_ERROR : MINIMAL_STATUS_OK,
    })
  );
}

/**
 * Handles one complete 8-byte header. Also the entry point for the header the
 * framing detector consumed while classifying the connection.
 */
export function dispatchMinimalHeader(
  ctx: ConnectionContext,
  bytes: Uint8Array,
  mailbox: SignalMailbox,
  env: EngineEnvironment
): void {
  const header = decodeMinimalHeader(bytes);
  let command: Command;
  try {
    command = minimalHeaderToCommand(header);
  } catch (error) {
    if (!isFramingError(error)) {
      throw error;
    }
    env.logger.warn(`minimal framing error: ${getErrorMessage(error)}`);
    reply(ctx, mailbox, true);
    ctx.tx.flush(ctx.transport, env.logger);
    return;
  }

  ctx.commandsHandled += 1;
  switch (command.kind) {
    case 'reset':
      env.logger.verbose('CMD_RESET');
      mailbox.cancel();
      mailbox.queueResetBurst();
      ctx.legacy.state = { phase: 'idle' };
      reply(ctx, mailbox, false);
      break;
    case 'set-port':
      env.logger.verbose('CMD_SET_PORT');
      reply(ctx, mailbox, false);
      break;
    case 'tms-seq':
    case 'scan':
      env.logger.verbose(`CMD_${command.kind === 'scan' ? 'SCAN' : 'TMS_SEQ'} bits=${command.bits}`);
      reply(ctx, mailbox, false);
      ctx.legacy.state = {
        phase: 'receiving-tms',
        bits: command.bits,
        purpose: command.kind,
        rx: new RxAccumulator(bytesForBits(command.bits)),
      };
      break;
    case 'oscan1-edge':
    case 'stop-simulation':
      // not produced by the minimal decoder
      reply(ctx, mailbox, true);
      break;
  }
  ctx.tx.flush(ctx.transport, env.logger);
}

/**
 * Advances the minimal-dialect state machine by one step.
 *
 * @throws TransportError when the client goes away
 */
export function pollLegacy(
  ctx: ConnectionContext,
  mailbox: SignalMailbox,
  env: EngineEnvironment
): void {
  const drained = ctx.tx.flush(ctx.transport, env.logger);
  const state = ctx.legacy.state;

  switch (state.phase) {
    case 'idle': {
      const header = ctx.legacy.header;
      if (!header.fill(ctx.transport, env.logger)) {
        return;
      }
      const bytes = header.take();
      header.reset();
      dispatchMinimalHeader(ctx, bytes, mailbox, env);
      return;
    }

    case 'receiving-tms': {
      if (!state.rx.fill(ctx.transport, env.logger)) {
        return;
      }
      const tms = state.rx.take();
      if (state.purpose === 'tms-seq') {
        ctx.legacy.state = {
          phase: 'processing',
          replyWithTdo: false,
          session: new ScanSession({
            bits: state.bits,
            tms,
            tdi: new Uint8Array(tms.length),
            bitOrder: env.bitOrder,
          }),
        };
        return;
      }
      ctx.legacy.state = {
        phase: 'receiving-tdi',
        bits: state.bits,
        tms,
        rx: new RxAccumulator(tms.length),
      };
      return;
    }

    case 'receiving-tdi': {
      if (!state.rx.fill(ctx.transport, env.logger)) {
        return;
      }
      ctx.legacy.state = {
        phase: 'processing',
        replyWithTdo: true,
        session: new ScanSession({
          bits: state.bits,
          tms: state.tms,
          tdi: state.rx.take(),
          bitOrder: env.bitOrder,
        }),
      };
      return;
    }

    case 'processing': {
      if (state.session.advance(mailbox) !== 'done') {
        return;
      }
      if (!state.replyWithTdo) {
        ctx.legacy.state = { phase: 'idle' };
        return;
      }
      ctx.tx.enqueue(state.session.result());
      ctx.legacy.state = { phase: 'sending-tdo' };
      return;
    }

    case 'sending-tdo':
      if (drained) {
        ctx.legacy.state = { phase: 'idle' };
      }
      return;
  }
}
