import { addDays, formatDistanceStrict, startOfDay } from "date-fns";
import type { AlertState } from "./types";

function relativeTime(date: Date, now: Date): string {
  return formatDistanceStrict(date, now);
}

export function alreadyPlayedAlert(nextStartsAt: Date, now: Date): AlertState {
  return {
    title: "Already played",
    message:
      "You already played today’s daily challenge. " +
      `You can play the next one in ${relativeTime(nextStartsAt, now)}.`,
    dismissButton: "OK",
  };
}

export function couldNotFetchDailyAlert(nextStartsAt: Date, now: Date): AlertState {
  return {
    title: "Couldn’t start today’s daily",
    message:
      "We’re sorry. We were unable to fetch today’s daily or you already started it earlier today. " +
      `You can play the next daily in ${relativeTime(nextStartsAt, now)}.`,
    dismissButton: "OK",
  };
}

/** e.g. "5 hours", counted to local midnight */
export function timeDescriptionUntilTomorrow(now: Date): string {
  return formatDistanceStrict(addDays(startOfDay(now), 1), now);
}
