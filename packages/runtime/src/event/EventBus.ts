import { EventEmitter } from 'eventemitter3';
import { filter, map, Observable } from 'rxjs';
import type {
  StreamDiagnostic,
  StreamEvent,
  StreamEventOf,
  StreamEventType,
} from '../types/index.js';

interface BusChannels {
  event: (event: StreamEvent) => void;
  diagnostic: (diagnostic: StreamDiagnostic) => void;
}

export class EventBus {
  // 底层 EventEmitter 负责把事件按推送方式广播给订阅者。
  private emitter = new EventEmitter<BusChannels>();

  /**
   * 将事件立即广播给所有活跃的订阅者。
   */
  public emit(event: StreamEvent): void {
    this.emitter.emit('event', event);
  }

  /**
   * 广播非致命的解析诊断（无法识别的帧、孤立的参数分片等）。
   */
  public reportDiagnostic(diagnostic: StreamDiagnostic): void {
    this.emitter.emit('diagnostic', diagnostic);
  }

  /**
   * 暴露一个冷 Observable，在订阅时挂接到 EventEmitter，
   * 并在取消订阅时自动移除此监听。
   */
  public events(): Observable<StreamEvent> {
    return new Observable<StreamEvent>((subscriber) => {
      const handler = (event: StreamEvent) => subscriber.next(event);
      this.emitter.on('event', handler);
      return () => {
        this.emitter.off('event', handler);
      };
    });
  }

  public diagnostics(): Observable<StreamDiagnostic> {
    return new Observable<StreamDiagnostic>((subscriber) => {
      const handler = (diagnostic: StreamDiagnostic) => subscriber.next(diagnostic);
      this.emitter.on('diagnostic', handler);
      return () => {
        this.emitter.off('diagnostic', handler);
      };
    });
  }

  /**
   * 便捷方法：只订阅某个特定类型的事件，同时复用同一个 emitter。
   */
  public eventsOfType<T extends StreamEventType>(
    type: T
  ): Observable<StreamEventOf<T>> {
    return this.events().pipe(
      filter((evt): evt is StreamEventOf<T> => evt.type === type)
    );
  }

  /**
   * 使用映射函数把原始事件转换成另一种形式，依然保持实时推送。
   */
  public mapEvents<T>(project: (event: StreamEvent) => T): Observable<T> {
    return this.events().pipe(map(project));
  }
}
