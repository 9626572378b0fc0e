import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Put,
  Query,
  Req,
} from '@nestjs/common';
import type { Request } from 'express';

import { ok } from '../../common/http/response.envelope';
import { getRequestId } from '../../common/http/request-id';

import { CreateIncidentDto } from './dto/create-incident.dto';
import { IncidentIdParamsDto } from './dto/incident-id-params.dto';
import { ListIncidentsDto } from './dto/list-incidents.dto';
import { UpdateStatusDto } from './dto/update-status.dto';
import { IncidentsService } from './incidents.service';

@Controller('v1')
export class IncidentsController {
  constructor(private readonly service: IncidentsService) {}

  @Get('incidents')
  async list(@Query() query: ListIncidentsDto, @Req() req: Request) {
    const requestId = getRequestId(req);

    const data = await this.service.list({
      startDate: query.start_date,
      endDate: query.end_date,
    });

    return ok(data, requestId);
  }

  @Get('incidents/:incident_id')
  async get(@Param() params: IncidentIdParamsDto, @Req() req: Request) {
    const requestId = getRequestId(req);
    const data = await this.service.get(params.incident_id);
    return ok(data, requestId);
  }

  @Delete('incidents/:incident_id')
  async delete(@Param() params: IncidentIdParamsDto, @Req() req: Request) {
    const requestId = getRequestId(req);
    const data = await this.service.delete(params.incident_id);
    return ok(data, requestId);
  }

  @Put('update-status')
  async updateStatus(@Body() body: UpdateStatusDto, @Req() req: Request) {
    const requestId = getRequestId(req);
    const data = await this.service.updateStatus(body.incident_id, body.status);
    return ok(data, requestId);
  }

  @Post('create_incident')
  @HttpCode(HttpStatus.CREATED)
  async create(@Body() body: CreateIncidentDto, @Req() req: Request) {
    const requestId = getRequestId(req);
    const data = await this.service.create(body);
    return ok(data, requestId);
  }
}
