import { ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Project } from './entities/project.entity';
import { Unit } from '../units/entities/unit.entity';
import { CreateProjectDto } from './dto/create-project.dto';
import { UpdateProjectDto } from './dto/update-project.dto';
import { ActivityService } from '../activity/activity.service';
import { Actor } from '../activity/actor';
import { Paginated, likePattern, pageWindow, toPage } from '../../common/utils/pagination';

@Injectable()
export class ProjectsService {
    constructor(
        @InjectRepository(Project)
        private projects: Repository<Project>,
        @InjectRepository(Unit)
        private units: Repository<Unit>,
        private activityService: ActivityService,
    ) { }

    async create(createProjectDto: CreateProjectDto, actor: Actor) {
        await this.assertNameAvailable(createProjectDto.name);

        const project = await this.projects.save(this.projects.create({
            name: createProjectDto.name,
            location: createProjectDto.location ?? null,
            description: createProjectDto.description ?? null,
        }));

        await this.activityService.create({ action: `Created Project: ${project.name}`, entityType: 'project', entityId: project.id }, actor);
        return project;
    }

    async findAll(query: { search?: string; page?: number; perPage?: number }): Promise<Paginated<Project>> {
        const { page, perPage, skip, take } = pageWindow(query);
        const qb = this.projects.createQueryBuilder('project')
            .loadRelationCountAndMap('project.unitCount', 'project.units')
            .orderBy('project.name', 'ASC')
            .skip(skip)
            .take(take);

        if (query.search) {
            qb.where(
                "(LOWER(project.name) LIKE :search ESCAPE '\\' OR LOWER(project.location) LIKE :search ESCAPE '\\')",
                { search: likePattern(query.search) },
            );
        }

        const [items, total] = await qb.getManyAndCount();
        return toPage(items, total, page, perPage);
    }

    async findOne(id: string) {
        const project = await this.projects.findOne({
            where: { id },
            relations: { units: { owner: true } },
        });
        if (!project) {
            throw new NotFoundException(`Project with ID ${id} not found`);
        }
        return project;
    }

    async update(id: string, updateProjectDto: UpdateProjectDto, actor: Actor) {
        const project = await this.findOne(id);
        if (updateProjectDto.name !== undefined && updateProjectDto.name !== project.name) {
            await this.assertNameAvailable(updateProjectDto.name);
        }

        await this.projects.update({ id }, { ...updateProjectDto });

        const updated = await this.findOne(id);
        await this.activityService.create({ action: `Updated Project: ${updated.name}`, entityType: 'project', entityId: id }, actor);
        return updated;
    }

    async remove(id: string, actor: Actor) {
        const project = await this.findOne(id);

        const unitCount = await this.units.count({ where: { projectId: id } });
        if (unitCount > 0) {
            throw new ConflictException(`Cannot delete project: it has ${unitCount} unit(s)`);
        }

        await this.projects.delete({ id });
        await this.activityService.create({ action: `Deleted Project: ${project.name}`, entityType: 'project', entityId: id }, actor);
        return { success: true };
    }

    private async assertNameAvailable(name: string) {
        const existing = await this.projects.findOne({ where: { name } });
        if (existing) {
            throw new ConflictException(`Project "${name}" already exists`);
        }
    }
}
