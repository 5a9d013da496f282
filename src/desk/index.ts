export {
	type Desk,
	type DeskComponents,
	type DeskSinks,
	type MemoryDeskSinks,
	createDesk,
	memorySinks,
} from "./create-desk.js";
