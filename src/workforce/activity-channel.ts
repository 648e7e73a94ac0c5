import { EventEmitter } from "eventemitter3";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { describeError } from "./errors.js";
import type { ActivityEvent, SchedulerExit } from "./types.js";

const log = createSubsystemLogger("workforce/channel");

export type ActivityNotification = ActivityEvent & { deploymentId: string };

export type ActivityListener = (notification: ActivityNotification) => void;
export type ExitListener = (exit: SchedulerExit) => void;

type ActivityChannelEvents = {
  activity: ActivityListener;
  exit: ExitListener;
};

/**
 * Fan-out point between schedulers and their consumers. Listeners run synchronously,
 * in subscription order; a throwing listener is logged and does not affect the others.
 */
export class ActivityChannel {
  private readonly emitter = new EventEmitter<ActivityChannelEvents>();

  onActivity(listener: ActivityListener, deploymentId?: string): () => void {
    const scoped: ActivityListener = deploymentId
      ? (notification) => {
          if (notification.deploymentId === deploymentId) {
            listener(notification);
          }
        }
      : listener;
    this.emitter.on("activity", scoped);
    return () => {
      this.emitter.off("activity", scoped);
    };
  }

  onExit(listener: ExitListener): () => void {
    this.emitter.on("exit", listener);
    return () => {
      this.emitter.off("exit", listener);
    };
  }

  publishActivity(notification: ActivityNotification): void {
    for (const listener of this.emitter.listeners("activity")) {
      try {
        listener(notification);
      } catch (err) {
        log.warn(
          { deploymentId: notification.deploymentId, error: describeError(err) },
          "Activity listener failed",
        );
      }
    }
  }

  publishExit(exit: SchedulerExit): void {
    for (const listener of this.emitter.listeners("exit")) {
      try {
        listener(exit);
      } catch (err) {
        log.warn({ deploymentId: exit.deploymentId, error: describeError(err) }, "Exit listener failed");
      }
    }
  }
}
