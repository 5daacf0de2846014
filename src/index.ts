export { TileStreamer } from './engine/streaming/TileStreamer';
export type { TickReport, TileStreamerDebugInfo } from './engine/streaming/TileStreamer';
export { TileCache } from './engine/streaming/TileCache';
export type { ActiveTile, RequestedTile, TileEntry, TileStateName } from './engine/streaming/TileCache';
export { OverlayIndex } from './engine/streaming/OverlayIndex';
export { DemandScheduler, visibleRangeForZoom, concurrencyBudgetForZoom } from './engine/streaming/DemandScheduler';
export type { ScheduleResult, ScheduledCandidate } from './engine/streaming/DemandScheduler';
export { FetchPipeline } from './engine/streaming/FetchPipeline';
export { ResultQueue } from './engine/streaming/ResultQueue';
export { ApplicationStage } from './engine/streaming/ApplicationStage';
export type { ApplyReport } from './engine/streaming/ApplicationStage';
export { TileEviction } from './engine/streaming/TileEviction';
export type { SweepReport, TileEvictionOptions } from './engine/streaming/TileEviction';
export { ZoomController } from './engine/streaming/ZoomController';
export type { ZoomControllerOptions, ZoomUpdate } from './engine/streaming/ZoomController';
export { applyOverlayTreatment, overlayBorderWidth } from './engine/streaming/overlayImage';
export { createDebugLogger } from './engine/streaming/DebugLogger';
export type { DebugLogger, LogSink } from './engine/streaming/DebugLogger';
export { DEFAULT_HEIGHT_THRESHOLDS, normalizeTileStreamerOptions } from './engine/streaming/options';
export type { ResolvedTileStreamerOptions, TileStreamerOptions } from './engine/streaming/options';
export type {
  CameraState,
  FetchResult,
  HeightZoomThreshold,
  OverlayEntry,
  OverlayTreatment,
  TileImage,
  TileImageSource,
  TileMetadata,
  TileRenderer,
  TileStreamFrame
} from './engine/streaming/types';
export { ThreeTileRenderer } from './engine/render/ThreeTileRenderer';
export type { ThreeTileRendererOptions, TileMesh } from './engine/render/ThreeTileRenderer';
export { UrlTemplateTileSource, loadImageWithCanvas } from './engine/sources/UrlTemplateTileSource';
export type { ImageLoader, TileYType, UrlTemplateTileSourceOptions } from './engine/sources/UrlTemplateTileSource';
export { GeoCoordinator } from './geo/coords';
export type { LonLat, MercatorXY, Vec3 } from './geo/coords';
export { PlanarTileProjection } from './geo/PlanarTileProjection';
export type { PlanarFrameOptions, PlanarTileProjectionOptions } from './geo/PlanarTileProjection';
export { tileKey, tileKeyId, reproject, reprojectToCoarser, reprojectToFiner, reprojectOrigin } from './geo/pyramid';
export type { TileKey } from './geo/pyramid';
