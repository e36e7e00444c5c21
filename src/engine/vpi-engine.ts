/**
 * @fileoverview Engine for OpenOCD's 1036-byte jtag_vpi packets.
 */

import type { ConnectionContext, EngineEnvironment } from '../bridge/connection-context';
import { TransportError, getErrorMessage, isFramingError } from '../bridge/errors';
import type { SignalMailbox } from '../bridge/mailbox';
import type { Command } from '../bridge/types';
import { VPI_CMD_OSCAN1, VPI_CMD_RESET, VPI_CMD_TMS_SEQ } from '../protocol/constants';
import {
  createVpiPacket,
  decodeVpiPacket,
  encodeVpiPacket,
  vpiPacketToCommand,
  type VpiPacket,
} from '../protocol/vpi-codec';
import { ScanSession } from './scan-session';
import { Sf0Exchange } from './sf0-exchange';

function respond(ctx: ConnectionContext, env: EngineEnvironment, packet: VpiPacket): void {
  ctx.tx.enqueue(encodeVpiPacket(packet));
  ctx.tx.flush(ctx.transport, env.logger);
}

/**
 * Carries out one decoded packet. Framing errors are logged and the packet is
 * dropped without a response; the connection stays up.
 *
 * @throws TransportError for STOP_SIMU
 */
export function dispatchVpiPacket(
  ctx: ConnectionContext,
  packet: VpiPacket,
  mailbox: SignalMailbox,
  env: EngineEnvironment
): void {
  let command: Command;
  try {
    command = vpiPacketToCommand(packet);
  } catch (error) {
    if (!isFramingError(error)) {
      throw error;
    }
    env.logger.verbose(`ignoring packet: ${getErrorMessage(error)}`);
    return;
  }

  ctx.commandsHandled += 1;
  switch (command.kind) {
    case 'reset':
      env.logger.verbose('CMD_RESET');
      mailbox.cancel();
      mailbox.queueResetBurst();
      ctx.vpi.work = { kind: 'idle' };
      respond(ctx, env, createVpiPacket({ cmd: VPI_CMD_RESET }));
      return;

    case 'tms-seq':
      env.logger.verbose(`CMD_TMS_SEQ bits=${command.bits}`);
      ctx.vpi.work = {
        kind: 'tms-seq',
        session: new ScanSession({
          bits: command.bits,
          tms: command.tms,
          tdi: new Uint8Array(command.tms.length),
          bitOrder: env.bitOrder,
        }),
      };
      respond(ctx, env, createVpiPacket({ cmd: VPI_CMD_TMS_SEQ }));
      return;

    case 'scan':
      env.logger.verbose(
        `CMD_SCAN_CHAIN${command.flipTmsOnLast ? '_FLIP_TMS' : ''} bits=${command.bits}`
      );
      ctx.vpi.work = {
        kind: 'scan',
        cmd: packet.cmd,
        session: new ScanSession({
          bits: command.bits,
          tms: ScanSession.synthesizeTms(command.bits, command.flipTmsOnLast, env.bitOrder),
          tdi: command.tdi,
          bitOrder: env.bitOrder,
        }),
      };
      return;

    case 'oscan1-edge': {
      env.logger.verbose(`CMD_OSCAN1 tms=${command.tms} tdi=${command.tdi}`);
      mailbox.setModeSelect(1);
      const exchange = new Sf0Exchange(command.tms, command.tdi);
      exchange.start(mailbox);
      ctx.vpi.work = { kind: 'oscan1', exchange };
      return;
    }

    case 'stop-simulation':
      env.logger.info('CMD_STOP_SIMU');
      throw TransportError.stopRequested();

    case 'set-port':
      // not produced by the packet decoder
      return;
  }
}

function advanceWork(ctx: ConnectionContext, mailbox: SignalMailbox, env: EngineEnvironment): void {
  const work = ctx.vpi.work;
  switch (work.kind) {
    case 'idle':
      return;

    case 'tms-seq':
      if (work.session.advance(mailbox) === 'done') {
        ctx.vpi.work = { kind: 'idle' };
      }
      return;

    case 'scan': {
      const { session } = work;
      if (session.advance(mailbox) !== 'done') {
        return;
      }
      ctx.vpi.work = { kind: 'idle' };
      respond(
        ctx,
        env,
        createVpiPacket({
          cmd: work.cmd,
          bufferIn: session.result(),
          length: session.byteCount,
          nbBits: session.bits,
        })
      );
      return;
    }

    case 'oscan1': {
      const tdo = work.exchange.advance(mailbox);
      if (tdo === undefined) {
        return;
      }
      ctx.vpi.work = { kind: 'idle' };
      respond(
        ctx,
        env,
        createVpiPacket({
          cmd: VPI_CMD_OSCAN1,
          bufferIn: Uint8Array.of(tdo),
          length: 1,
          nbBits: 2,
        })
      );
      return;
    }
  }
}

/**
 * One step of the full-packet engine: drain pending output, advance the
 * current command, and only when both are finished read toward the next
 * packet.
 *
 * @throws TransportError when the client goes away or asks to stop
 */
export function pollVpi(
  ctx: ConnectionContext,
  mailbox: SignalMailbox,
  env: EngineEnvironment
): void {
  const drained = ctx.tx.flush(ctx.transport, env.logger);
  if (ctx.vpi.work.kind !== 'idle') {
    advanceWork(ctx, mailbox, env);
    return;
  }
  if (!drained) {
    return;
  }
  const rx = ctx.vpi.rx;
  if (!rx.fill(ctx.transport, env.logger)) {
    return;
  }
  const packet = decodeVpiPacket(rx.take());
  rx.reset();
  dispatchVpiPacket(ctx, packet, mailbox, env);
}
