export { ChartReader, type ChartData, type ChartSeriesData } from './ChartReader.js';
