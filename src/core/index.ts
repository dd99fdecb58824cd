export { groupKeyOf, groupSegments, toWholeSecond } from "./segment-grouper";
export { SegmentIndex } from "./segment-index";
