// @blockpaint/ui — Terminal output helpers
export {
	reset,
	rgb,
	bgRgb,
	quoteEscapes,
} from "./ansi.js";
