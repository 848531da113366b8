export { DeepCrawler, crawl, type DeepCrawlerDependencies } from './deep-crawler.js';
