export { useFeed } from "./use-feed";
export type { UseFeedResult } from "./use-feed";

export { useThreads } from "./use-threads";
export type { UseThreadsResult, ThreadLists } from "./use-threads";

export { useThreadMessages } from "./use-thread-messages";
export type { UseThreadMessagesResult } from "./use-thread-messages";

export { useLeaderboard } from "./use-leaderboard";
export type { UseLeaderboardResult, LeaderboardEntry } from "./use-leaderboard";
