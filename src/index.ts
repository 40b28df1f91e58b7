export * from "@/admin/audit";
export * from "@/engine";
export * from "@/models";
export * from "@/realtime";
export * from "@/scheduler/Clock";
export * from "@/storage/MemoryStorage";
export * from "@/storage/Storage";
