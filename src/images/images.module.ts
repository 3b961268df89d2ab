import { Module } from '@nestjs/common';
import axios from 'axios';
import { CatalogModule } from '../catalog/catalog.module';
import { HttpImageDownloader, ImageDownloader } from './image-downloader';
import { ImageEnrichmentService } from './image-enrichment.service';
import { ImageProcessor, SharpImageProcessor } from './image-processor';
import { IMAGES_HTTP, ImageSearchService, SerpApiImageSearchService } from './image-search.service';
import { ImageStorage, SupabaseImageStorage } from './image-storage';

@Module({
  imports: [CatalogModule],
  providers: [
    { provide: IMAGES_HTTP, useFactory: () => axios.create({ maxRedirects: 5 }) },
    { provide: ImageSearchService, useClass: SerpApiImageSearchService },
    { provide: ImageDownloader, useClass: HttpImageDownloader },
    { provide: ImageProcessor, useClass: SharpImageProcessor },
    { provide: ImageStorage, useClass: SupabaseImageStorage },
    ImageEnrichmentService,
  ],
  exports: [ImageEnrichmentService],
})
export class ImagesModule {}
