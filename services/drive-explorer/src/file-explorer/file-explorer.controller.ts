import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import type { RemotePage } from '../browser/browser.types';
import type { BatchReport } from '../transfer/types/transfer-context';
import { BrowseQueryDto, TransferRequestDto } from './file-explorer.dtos';
import { FileExplorerService } from './file-explorer.service';

@Controller('connections/:connectionId')
export class FileExplorerController {
  public constructor(private readonly fileExplorerService: FileExplorerService) {}

  @Get('browse')
  public async browse(
    @Param('connectionId') connectionId: string,
    @Query() query: BrowseQueryDto,
  ): Promise<RemotePage> {
    return this.fileExplorerService.browse(connectionId, query);
  }

  @Post('transfer')
  @HttpCode(HttpStatus.OK)
  public async transfer(
    @Param('connectionId') connectionId: string,
    @Body() body: TransferRequestDto,
  ): Promise<BatchReport> {
    return this.fileExplorerService.transfer(connectionId, body);
  }
}
