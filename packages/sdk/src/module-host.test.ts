import {
  BusError,
  Message,
  MessageError,
  MessageResponse,
  createMemorySink,
  getDiagnosticSink,
  silentDiagnosticSink,
} from 'instrument-bus';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { BusModule } from './bus-module.js';
import { DIAGNOSTICS_ENV } from './host-config.js';
import { type ModuleHostOptions, ModuleHost } from './module-host.js';

class RecordingModule extends BusModule {
  readonly received: string[] = [];

  processMessage(message: Message): void {
    this.received.push(message.getType());
  }
}

class CameraModule extends BusModule {
  processMessage(message: Message): void {
    if (message.getType() === 'current parameters') {
      message.addResponse(new MessageResponse({ source: this.moduleName, data: { exposure: 0.1 } }));
    }
  }
}

class StageModule extends BusModule {
  processMessage(message: Message): void {
    if (message.getType() === 'start') {
      throw new Error('stage offline');
    }
    if (message.getType() === 'new directory') {
      message.addError(new MessageError({ source: this.moduleName, message: 'directory not writable' }));
    }
  }
}

class ReportingStageModule extends BusModule {
  processMessage(message: Message): void {
    if (message.getType() !== 'current parameters') return;
    message.addError(new MessageError({ source: this.moduleName, message: 'encoder lost', exception: new Error('encoder lost') }));
    message.addError(new MessageError({ source: this.moduleName, message: 'position clamped' }));
    message.addResponse(new MessageResponse({ source: this.moduleName, data: { x: 10 } }));
  }
}

class SettingsModule extends BusModule {
  readonly responses: unknown[] = [];
  handled: MessageError[] = [];
  handlesErrors = false;

  handleResponses(message: Message): void {
    for (const response of message.getResponses()) this.responses.push(response.getData());
  }

  handleError(_message: Message, error: MessageError): boolean {
    this.handled.push(error);
    return this.handlesErrors;
  }
}

function createLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('ModuleHost', () => {
  const hosts: ModuleHost[] = [];

  function createHost(options: ModuleHostOptions = {}): ModuleHost {
    const host = new ModuleHost({ env: {}, logger: createLogger(), ...options });
    hosts.push(host);
    return host;
  }

  afterEach(async () => {
    for (const host of hosts.splice(0)) await host.close();
  });

  describe('modules', () => {
    it('should attach added modules', () => {
      const camera = new RecordingModule('camera1');
      const host = createHost({ modules: [camera] });
      expect(camera.isAttached()).toBe(true);
      expect(host.getModule('camera1')).toBe(camera);
      expect(host.getModuleNames()).toEqual(['camera1']);
    });

    it('should reject a second module with the same name', () => {
      const host = createHost({ modules: [new RecordingModule('camera1')] });
      try {
        host.addModule(new RecordingModule('camera1'));
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(BusError);
        if (err instanceof BusError) expect(err.code).toBe('DUPLICATE_MODULE');
      }
    });

    it('should detach removed modules and stop delivering to them', () => {
      const camera = new RecordingModule('camera1');
      const host = createHost({ modules: [camera] });
      expect(host.removeModule('camera1')).toBe(true);
      expect(host.removeModule('camera1')).toBe(false);
      expect(camera.isAttached()).toBe(false);

      host.send(new Message({ type: 'start', source: host }));
      expect(camera.received).toEqual([]);
    });
  });

  describe('start', () => {
    it('should run the start-up sequence with barriers', async () => {
      const camera = new RecordingModule('camera1');
      const host = createHost({ modules: [camera] });
      await host.start();
      expect(camera.received).toEqual(['configure1', 'sync', 'configure2', 'sync', 'start', 'sync']);
    });

    it('should tell configure1 recipients which modules are loaded', async () => {
      let data: unknown;
      class Probe extends BusModule {
        processMessage(message: Message): void {
          if (message.getType() === 'configure1') data = message.getData();
        }
      }
      const host = createHost({ modules: [new Probe('probe'), new RecordingModule('camera1')] });
      await host.start();
      expect(data).toEqual({ moduleNames: ['probe', 'camera1'] });
    });

    it('should finish each step in every module before the next step', async () => {
      const log: string[] = [];
      class SlowModule extends BusModule {
        async processMessage(message: Message): Promise<void> {
          if (message.getType() !== 'configure1') return;
          log.push('slow:configure1:begin');
          await new Promise<void>((resolve) => setTimeout(resolve, 5));
          log.push('slow:configure1:end');
        }
      }
      class FastModule extends BusModule {
        processMessage(message: Message): void {
          if (message.getType() !== 'sync') log.push(`fast:${message.getType()}`);
        }
      }

      const host = createHost({ modules: [new SlowModule('slow'), new FastModule('fast')] });
      const statuses: string[] = [];
      host.onStatus((status) => statuses.push(status));
      await host.start();

      expect(log).toEqual([
        'slow:configure1:begin',
        'fast:configure1',
        'slow:configure1:end',
        'fast:configure2',
        'fast:start',
      ]);
      expect(statuses[statuses.length - 1]).toBe('started');
    });
  });

  describe('outcomes', () => {
    it('should hand responses back to the sending module', () => {
      const settings = new SettingsModule('settings');
      createHost({ modules: [settings, new CameraModule('camera1')] });

      settings.sendMessage(new Message({ type: 'current parameters', source: settings }));

      expect(settings.responses).toEqual([{ exposure: 0.1 }]);
    });

    it('should let the sender handle fatal errors', () => {
      const logger = createLogger();
      const settings = new SettingsModule('settings');
      settings.handlesErrors = true;
      const host = createHost({ modules: [settings, new StageModule('stage')], logger });
      const onFatalError = vi.fn();
      host.onFatalError(onFatalError);
      const statuses: Array<[string, string | undefined]> = [];
      host.onStatus((status, detail) => statuses.push([status, detail]));

      settings.sendMessage(new Message({ type: 'start', source: settings }));

      expect(settings.handled.map((error) => error.message)).toEqual(['stage offline']);
      expect(onFatalError).not.toHaveBeenCalled();
      expect(logger.error).not.toHaveBeenCalled();
      expect(statuses).toContainEqual(['message:error-handled', 'stage: stage offline']);
    });

    it('should escalate unhandled fatal errors to subscribers', () => {
      const settings = new SettingsModule('settings');
      const host = createHost({ modules: [settings, new StageModule('stage')] });
      const onFatalError = vi.fn();
      host.onFatalError(onFatalError);

      const message = new Message({ type: 'start', source: settings });
      settings.sendMessage(message);

      expect(settings.handled).toHaveLength(1);
      expect(onFatalError).toHaveBeenCalledTimes(1);
      expect(onFatalError).toHaveBeenCalledWith(message, message.getErrors()[0]);
    });

    it('should log unhandled fatal errors when nobody subscribed', () => {
      const logger = createLogger();
      const host = createHost({ modules: [new StageModule('stage')], logger });

      const message = new Message({ type: 'start', source: host });
      host.send(message);

      expect(logger.error).toHaveBeenCalledWith(
        "[ModuleHost] Unhandled error from stage on 'start' sent by host:",
        message.getErrors()[0]?.getException(),
      );
    });

    it('should still hand back responses when the sender fails handling an error', () => {
      const logger = createLogger();
      const failure = new Error('cannot recover');
      class FragileSettings extends SettingsModule {
        handleError(): boolean {
          throw failure;
        }
      }
      const settings = new FragileSettings('settings');
      const host = createHost({ modules: [settings, new ReportingStageModule('stage')], logger });
      const statuses: string[] = [];
      host.onStatus((status) => statuses.push(status));

      const message = new Message({ type: 'current parameters', source: settings });
      settings.sendMessage(message);

      expect(settings.responses).toEqual([{ x: 10 }]);
      expect(logger.warn).toHaveBeenCalledWith("[ModuleHost] stage warning on 'current parameters': position clamped");
      expect(logger.error).toHaveBeenCalledWith(
        `[MessageQueue] onFatalError for ${message.id} 'current parameters' failed:`,
        failure,
      );
      expect(statuses).toEqual(['message:sent', 'message:warning', 'message:finalized']);
    });

    it('should log warnings and keep going', () => {
      const logger = createLogger();
      const host = createHost({ modules: [new StageModule('stage')], logger });
      const finalizer = vi.fn();

      host.send(new Message({ type: 'new directory', source: host, data: { path: '/data' }, finalizer }));

      expect(logger.warn).toHaveBeenCalledWith(
        "[ModuleHost] stage warning on 'new directory': directory not writable",
      );
      expect(finalizer).toHaveBeenCalledTimes(1);
    });
  });

  describe('status', () => {
    it('should report a message as sent before it is finalized', () => {
      const host = createHost({ modules: [new RecordingModule('camera1')] });
      const statuses: Array<[string, string | undefined]> = [];
      host.onStatus((status, detail) => statuses.push([status, detail]));

      host.send(new Message({ type: 'start', source: host }));

      expect(statuses).toEqual([
        ['message:sent', 'start'],
        ['message:finalized', 'start'],
      ]);
    });

    it('should not report a rejected message as sent', () => {
      const host = createHost();
      const statuses: string[] = [];
      host.onStatus((status) => statuses.push(status));

      expect(() => host.send(new Message({ type: 'strat', source: host }))).toThrowError(BusError);
      expect(statuses).toEqual([]);
    });
  });

  describe('diagnostics', () => {
    it('should install the sink while open and restore the previous one on close', async () => {
      const sink = createMemorySink();
      const source = new RecordingModule('camera1');
      const host = createHost({ modules: [source], sink });
      expect(getDiagnosticSink()).toBe(sink);

      const message = new Message({ type: 'module', source });
      host.send(message);
      expect(sink.events).toEqual([
        { event: 'created', messageId: message.id, sourceName: 'camera1', messageType: 'module' },
        { event: 'destroyed', messageId: message.id, sourceName: 'camera1', messageType: 'module' },
      ]);

      await host.close();
      expect(getDiagnosticSink()).toBe(silentDiagnosticSink);
    });

    it('should write lifecycle lines to the logger when configured from the environment', () => {
      const logger = createLogger();
      const host = createHost({ env: { [DIAGNOSTICS_ENV]: 'console' }, logger });

      const message = new Message({ type: 'start', source: host });
      host.send(message);

      expect(logger.log).toHaveBeenCalledWith(`created,${message.id},host,start`);
      expect(logger.log).toHaveBeenCalledWith(`destroyed,${message.id},host,start`);
    });
  });

  describe('close', () => {
    it('should send close event and detach modules', async () => {
      const camera = new RecordingModule('camera1');
      const host = createHost({ modules: [camera] });
      const statuses: string[] = [];
      host.onStatus((status) => statuses.push(status));

      await host.close();

      expect(camera.received).toEqual(['close event']);
      expect(camera.isAttached()).toBe(false);
      expect(statuses[statuses.length - 1]).toBe('closed');
      expect(() => host.send(new Message({ type: 'start', source: host }))).toThrowError(/queue is closed/);
    });

    it('should allow being called twice', async () => {
      const camera = new RecordingModule('camera1');
      const host = createHost({ modules: [camera] });
      await host.close();
      await host.close();
      expect(camera.received).toEqual(['close event']);
    });
  });
});
