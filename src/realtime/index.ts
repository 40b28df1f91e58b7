export * from "@/realtime/LoggingAdapter";
export * from "@/realtime/MockAdapter";
export * from "@/realtime/RealtimeAdapter";
