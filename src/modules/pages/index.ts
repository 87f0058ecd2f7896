/**
 * Pages module: static-site publishing.
 */

export type { PagesPublisher, PublishResult, PagesUrlSource } from './pages-publisher.js'
export { PagesPublisherImpl, createPagesPublisher } from './pages-publisher-impl.js'
export type { PagesPublisherConfig, PagesPublisherDeps } from './pages-publisher-impl.js'
