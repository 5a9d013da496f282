export type { RecordSink } from "./record-sink.js";
export { MemoryRecordSink, type MemoryRecordSinkConfig } from "./memory-record-sink.js";
export { FileRecordSink, type FileRecordSinkConfig } from "./file-record-sink.js";
export {
	type RecordLayout,
	type PositionRecord,
	type RiskRecord,
	type StreamRecord,
	type GuiQuoteRecord,
	type ExecutionRecord,
	type InquiryRecord,
	POSITION_LAYOUT,
	RISK_LAYOUT,
	STREAM_LAYOUT,
	GUI_QUOTE_LAYOUT,
	EXECUTION_LAYOUT,
	INQUIRY_LAYOUT,
	positionRecord,
	riskRecord,
	streamRecord,
	guiQuoteRecord,
	executionRecord,
	inquiryRecord,
	toCsvLine,
	csvHeader,
} from "./records.js";
export {
	HistoricalDataService,
	type HistoricalDataServiceOptions,
	positionHistory,
	riskHistory,
	streamingHistory,
	guiQuoteHistory,
	executionHistory,
	inquiryHistory,
} from "./historical-data-service.js";
